import { promises as fs } from 'node:fs';
import { makeBuild } from '../testing/radar.fixtures';
import { BuildStorageService } from './build-storage.service';

describe('BuildStorageService', () => {
  let service: BuildStorageService;

  beforeEach(() => {
    service = new BuildStorageService({
      itemsPath: '/tmp/radar-test/raw_items.json',
      latestBuildPath: '/tmp/radar-test/latest_build.json',
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('accepts an inbox wrapped in an items envelope', async () => {
    jest
      .spyOn(fs, 'readFile')
      .mockResolvedValue(JSON.stringify({ items: [{ event_uid: 'a' }] }));

    await expect(service.loadRawItems()).resolves.toEqual([{ event_uid: 'a' }]);
  });

  it('treats an unreadable inbox as empty', async () => {
    jest.spyOn(fs, 'readFile').mockResolvedValue('{not json');

    await expect(service.loadRawItems()).resolves.toEqual([]);
  });

  it('writes the latest build atomically with temp file rename', async () => {
    const mkdirSpy = jest.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
    const writeSpy = jest.spyOn(fs, 'writeFile').mockResolvedValue(undefined);
    const renameSpy = jest.spyOn(fs, 'rename').mockResolvedValue(undefined);
    const unlinkSpy = jest.spyOn(fs, 'unlink').mockResolvedValue(undefined);

    await service.saveLatestBuild(makeBuild());

    expect(mkdirSpy).toHaveBeenCalledWith('/tmp/radar-test', {
      recursive: true,
    });
    expect(writeSpy).toHaveBeenCalledTimes(1);
    expect(renameSpy).toHaveBeenCalledTimes(1);
    expect(renameSpy.mock.calls[0][1]).toBe('/tmp/radar-test/latest_build.json');
    expect(unlinkSpy).not.toHaveBeenCalled();
  });

  it('removes the temp file when the rename fails', async () => {
    jest.spyOn(fs, 'mkdir').mockResolvedValue(undefined);
    jest.spyOn(fs, 'writeFile').mockResolvedValue(undefined);
    jest.spyOn(fs, 'rename').mockRejectedValue(new Error('busy'));
    const unlinkSpy = jest.spyOn(fs, 'unlink').mockResolvedValue(undefined);

    await expect(service.saveLatestBuild(makeBuild())).rejects.toThrow('busy');
    expect(unlinkSpy).toHaveBeenCalledTimes(1);
  });
});
