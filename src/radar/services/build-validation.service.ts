import { Injectable } from '@nestjs/common';
import { IncompleteBuildError } from '../errors/radar.errors';
import {
  AuditEntry,
  AuditTargetKind,
  BuildResult,
  Score,
} from '../types/radar.types';
import { scoreFromContributions } from '../utils/score.util';

@Injectable()
export class BuildValidationService {
  /**
   * Throws IncompleteBuildError unless every movement and theme carries a
   * score that its own audit entries of this build reproduce.
   */
  assertComplete(build: BuildResult): void {
    const buildId = build.buildId;
    if (!buildId) {
      throw new IncompleteBuildError('build id is missing', '');
    }
    if (!build.meta?.scoringVersion) {
      throw new IncompleteBuildError('scoring version is missing', buildId);
    }
    if (!Number.isFinite(build.meta.distanceThreshold)) {
      throw new IncompleteBuildError('distance threshold is missing', buildId);
    }
    if (
      !Array.isArray(build.movements) ||
      !Array.isArray(build.themes) ||
      !Array.isArray(build.audit)
    ) {
      throw new IncompleteBuildError(
        'movements, themes and audit are required',
        buildId,
      );
    }

    const entriesByTarget = new Map<string, AuditEntry[]>();
    for (const entry of build.audit) {
      if (entry.buildId !== buildId) {
        throw new IncompleteBuildError(
          `audit entry belongs to build ${entry.buildId}`,
          buildId,
          entry.targetId,
        );
      }
      const list = entriesByTarget.get(entry.targetId) ?? [];
      list.push(entry);
      entriesByTarget.set(entry.targetId, list);
    }

    const movementIds = new Set<string>();
    for (const movement of build.movements) {
      movementIds.add(movement.id);
      this.assertScored(
        buildId,
        movement.id,
        'movement',
        movement.score,
        entriesByTarget.get(movement.id),
      );
    }
    for (const theme of build.themes) {
      this.assertScored(
        buildId,
        theme.id,
        'theme',
        theme.score,
        entriesByTarget.get(theme.id),
      );
      const unknown = theme.movementIds.find((id) => !movementIds.has(id));
      if (unknown) {
        throw new IncompleteBuildError(
          `theme references unknown movement ${unknown}`,
          buildId,
          theme.id,
        );
      }
    }
  }

  private assertScored(
    buildId: string,
    targetId: string,
    kind: AuditTargetKind,
    score: Score | undefined,
    entries: AuditEntry[] | undefined,
  ): void {
    if (!score || !Number.isFinite(score.value)) {
      throw new IncompleteBuildError(`${kind} has no score`, buildId, targetId);
    }
    if (!entries || entries.length === 0) {
      throw new IncompleteBuildError(
        `${kind} score has no audit entries`,
        buildId,
        targetId,
      );
    }
    if (entries.some((entry) => entry.targetKind !== kind)) {
      throw new IncompleteBuildError(
        `audit entries are not ${kind} entries`,
        buildId,
        targetId,
      );
    }
    const recomputed = scoreFromContributions(entries);
    if (recomputed !== score.value) {
      throw new IncompleteBuildError(
        `audit entries sum to ${recomputed}, score is ${score.value}`,
        buildId,
        targetId,
      );
    }
  }
}
