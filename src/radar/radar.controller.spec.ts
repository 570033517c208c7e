import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  ConfigurationError,
  IncompleteBuildError,
  SnapshotLabelConflictError,
} from './errors/radar.errors';
import { RadarController } from './radar.controller';
import { makeBuild } from './testing/radar.fixtures';

describe('RadarController', () => {
  const build = makeBuild();
  const buildService = {
    runBuild: jest.fn().mockResolvedValue(build),
    getLatestBuild: jest.fn(),
    snapshotLatest: jest.fn(),
  };
  const snapshotStore = {
    listSnapshots: jest.fn(),
    getSnapshot: jest.fn(),
    getHistory: jest.fn(),
  };
  const auditTrailService = {
    explain: jest.fn(),
  };
  const controller = new RadarController(
    buildService as never,
    snapshotStore as never,
    auditTrailService as never,
  );

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('reports health', () => {
    expect(controller.getHealth()).toEqual({
      status: 'ok',
      service: 'movement-radar',
    });
  });

  it('parses build overrides from the body', async () => {
    await controller.runBuild({
      items: [],
      distanceThreshold: '0.4',
      linkage: 'average',
      weights: 'recency:0.6,trust:0.4',
      asOf: ' 2026-06-30 ',
    });

    expect(buildService.runBuild).toHaveBeenCalledWith({
      items: [],
      overrides: {
        distanceThreshold: 0.4,
        linkage: 'average',
        weights: { recency: 0.6, trust: 0.4 },
      },
      asOf: '2026-06-30',
    });
  });

  it('rejects malformed build bodies', async () => {
    await expect(
      controller.runBuild({ linkage: 'ward' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      controller.runBuild({ items: 'nope' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      controller.runBuild({ weights: { recency: 'high' } }),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      controller.runBuild({ topK: 'many' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(buildService.runBuild).not.toHaveBeenCalled();
  });

  it('maps configuration errors to bad requests', async () => {
    buildService.runBuild.mockRejectedValueOnce(
      new ConfigurationError('distanceThreshold must be within [0,1]'),
    );

    await expect(
      controller.runBuild({ distanceThreshold: 3 }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('returns 404 before any build exists', async () => {
    buildService.getLatestBuild.mockResolvedValue(null);

    await expect(controller.getLatestBuild()).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('passes snapshot options through', async () => {
    buildService.snapshotLatest.mockResolvedValue({ id: 'q2-0001' });

    await controller.createSnapshot({ label: 'q2', allowRelabel: 'yes' });

    expect(buildService.snapshotLatest).toHaveBeenCalledWith({
      label: 'q2',
      allowRelabel: true,
    });
  });

  it('maps snapshot failures to http errors', async () => {
    buildService.snapshotLatest.mockRejectedValueOnce(
      new IncompleteBuildError('theme score has no audit entries', 'b-test'),
    );
    await expect(controller.createSnapshot({})).rejects.toBeInstanceOf(
      UnprocessableEntityException,
    );

    buildService.snapshotLatest.mockRejectedValueOnce(
      new SnapshotLabelConflictError('q2', 'b-test'),
    );
    await expect(
      controller.createSnapshot({ label: 'q2' }),
    ).rejects.toBeInstanceOf(ConflictException);

    buildService.snapshotLatest.mockResolvedValueOnce(null);
    await expect(controller.createSnapshot({})).rejects.toBeInstanceOf(
      NotFoundException,
    );

    await expect(
      controller.createSnapshot({ allowRelabel: 'maybe' }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('explains a score with its recomputed value', async () => {
    const entries = build.audit.filter((entry) => entry.targetId === 'mv-1');
    auditTrailService.explain.mockResolvedValue(entries);

    const result = await controller.getAudit('b-test', 'mv-1');

    expect(result).toEqual({
      buildId: 'b-test',
      targetId: 'mv-1',
      score: 76,
      entries,
    });
  });

  it('returns 404 for unknown audit targets', async () => {
    auditTrailService.explain.mockResolvedValue([]);

    await expect(
      controller.getAudit('b-test', 'mv-missing'),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('returns theme history and 404 for unknown snapshots', async () => {
    snapshotStore.getHistory.mockResolvedValue([{ label: 'q2', score: 76 }]);
    snapshotStore.getSnapshot.mockResolvedValue(null);

    await expect(controller.getHistory('Money')).resolves.toEqual({
      theme: 'Money',
      points: [{ label: 'q2', score: 76 }],
    });
    await expect(controller.getSnapshot('q9-0001')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});
