import { RadarError } from '../errors/radar.errors';
import { makeBuild } from '../testing/radar.fixtures';
import { FactorContribution } from '../types/radar.types';
import {
  AuditTrail,
  AuditTrailBuilder,
  AuditTrailService,
} from './audit-trail.service';

const BREAKDOWN: FactorContribution[] = [
  { factor: 'recency', rawValue: 1, weight: 0.5, contribution: 0.5 },
  { factor: 'trust', rawValue: 0.6, weight: 0.3, contribution: 0.18 },
];

describe('AuditTrailBuilder', () => {
  it('numbers entries in record order and freezes them', () => {
    const builder = new AuditTrailBuilder('b-1');
    builder.record('mv-1', 'movement', BREAKDOWN);
    builder.record('theme-x', 'theme', [
      { factor: 'movement:mv-1', rawValue: 0.68, weight: 1, contribution: 0.68 },
    ]);

    const trail = builder.finalize();

    expect(trail.entries.map((entry) => entry.sequence)).toEqual([0, 1, 2]);
    expect(trail.entriesFor('mv-1').map((entry) => entry.factor)).toEqual([
      'recency',
      'trust',
    ]);
    expect(trail.targetIds()).toEqual(['mv-1', 'theme-x']);
    expect(trail.recomputeScore('mv-1')).toBe(68);
    expect(trail.recomputeScore('missing')).toBeNull();
    expect(Object.isFrozen(trail.entries)).toBe(true);
    expect(Object.isFrozen(trail.entries[0])).toBe(true);
  });

  it('rejects records after finalize', () => {
    const builder = new AuditTrailBuilder('b-1');
    builder.finalize();

    expect(() => builder.record('mv-1', 'movement', BREAKDOWN)).toThrow(
      RadarError,
    );
  });
});

describe('AuditTrailService', () => {
  const snapshotStore = {
    findByBuildId: jest.fn(),
  };
  const service = new AuditTrailService(snapshotStore as never);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('explains scores from trails held in memory', async () => {
    const builder = new AuditTrailBuilder('b-mem');
    builder.record('mv-1', 'movement', BREAKDOWN);
    service.register(builder.finalize());

    const entries = await service.explain('b-mem', 'mv-1');

    expect(entries.map((entry) => entry.contribution)).toEqual([0.5, 0.18]);
    expect(snapshotStore.findByBuildId).not.toHaveBeenCalled();
  });

  it('falls back to committed snapshots', async () => {
    const build = makeBuild({ buildId: 'b-old' });
    snapshotStore.findByBuildId.mockResolvedValue({ build });

    const entries = await service.explain('b-old', 'mv-1');

    expect(snapshotStore.findByBuildId).toHaveBeenCalledWith('b-old');
    expect(entries).toEqual(
      build.audit.filter((entry) => entry.targetId === 'mv-1'),
    );
  });

  it('returns no entries for unknown builds', async () => {
    snapshotStore.findByBuildId.mockResolvedValue(null);

    await expect(service.explain('b-none', 'mv-1')).resolves.toEqual([]);
  });

  it('retains only the most recent trails', () => {
    for (let i = 0; i < 21; i += 1) {
      service.register(new AuditTrail(`b-${i}`, []));
    }

    expect(service.getTrail('b-0')).toBeNull();
    expect(service.getTrail('b-20')).not.toBeNull();
  });
});
