import { Injectable } from '@nestjs/common';
import { RadarError } from '../errors/radar.errors';
import {
  AuditEntry,
  AuditTargetKind,
  FactorContribution,
} from '../types/radar.types';
import { scoreFromContributions } from '../utils/score.util';
import { SnapshotStoreService } from './snapshot-store.service';

const MAX_RETAINED_TRAILS = 20;

export class AuditTrail {
  private readonly byTarget = new Map<string, readonly AuditEntry[]>();

  constructor(
    readonly buildId: string,
    readonly entries: readonly AuditEntry[],
  ) {
    for (const entry of entries) {
      const list = this.byTarget.get(entry.targetId) ?? [];
      this.byTarget.set(entry.targetId, [...list, entry]);
    }
  }

  entriesFor(targetId: string): readonly AuditEntry[] {
    return this.byTarget.get(targetId) ?? [];
  }

  targetIds(): string[] {
    return [...this.byTarget.keys()];
  }

  recomputeScore(targetId: string): number | null {
    const entries = this.entriesFor(targetId);
    return entries.length > 0 ? scoreFromContributions(entries) : null;
  }
}

/**
 * Collects one entry per factor for every score of a build. Entries are
 * frozen on write; once finalized the builder rejects further records.
 */
export class AuditTrailBuilder {
  private readonly entries: AuditEntry[] = [];
  private finalized = false;

  constructor(readonly buildId: string) {}

  record(
    targetId: string,
    targetKind: AuditTargetKind,
    breakdown: readonly FactorContribution[],
  ): readonly AuditEntry[] {
    if (this.finalized) {
      throw new RadarError('audit trail already finalized', {
        buildId: this.buildId,
        targetId,
      });
    }
    const recorded = breakdown.map((item, offset) =>
      Object.freeze({
        buildId: this.buildId,
        targetId,
        targetKind,
        sequence: this.entries.length + offset,
        factor: item.factor,
        rawValue: item.rawValue,
        weight: item.weight,
        contribution: item.contribution,
      }),
    );
    this.entries.push(...recorded);
    return recorded;
  }

  finalize(): AuditTrail {
    this.finalized = true;
    return new AuditTrail(this.buildId, Object.freeze([...this.entries]));
  }
}

@Injectable()
export class AuditTrailService {
  private readonly trails = new Map<string, AuditTrail>();

  constructor(private readonly snapshotStore: SnapshotStoreService) {}

  register(trail: AuditTrail): void {
    this.trails.delete(trail.buildId);
    this.trails.set(trail.buildId, trail);
    while (this.trails.size > MAX_RETAINED_TRAILS) {
      const oldest = this.trails.keys().next().value;
      if (oldest === undefined) {
        break;
      }
      this.trails.delete(oldest);
    }
  }

  getTrail(buildId: string): AuditTrail | null {
    return this.trails.get(buildId) ?? null;
  }

  /**
   * Ordered entries that justify the score of a movement or theme within a
   * build. Falls back to committed snapshots for builds no longer in memory.
   */
  async explain(buildId: string, targetId: string): Promise<AuditEntry[]> {
    const trail = this.trails.get(buildId);
    if (trail) {
      return [...trail.entriesFor(targetId)];
    }
    const snapshot = await this.snapshotStore.findByBuildId(buildId);
    if (!snapshot) {
      return [];
    }
    return snapshot.build.audit.filter((entry) => entry.targetId === targetId);
  }
}
