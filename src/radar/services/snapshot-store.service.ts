import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SNAPSHOT_STORE_DIR } from '../config/radar.constants';
import {
  ConfigurationError,
  SnapshotLabelConflictError,
  SnapshotStoreError,
} from '../errors/radar.errors';
import {
  BuildResult,
  HistoryPoint,
  Snapshot,
  SnapshotHeader,
  SnapshotOptions,
} from '../types/radar.types';
import { quarterLabel } from '../utils/date.util';
import { deepFreeze } from '../utils/freeze.util';
import {
  fileExists,
  readJsonFile,
  writeJsonAtomic,
} from '../utils/json-file.util';
import { BuildValidationService } from './build-validation.service';

interface SnapshotIndex {
  snapshots: SnapshotHeader[];
}

const LABEL_RE = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

/**
 * Append-only snapshot store. A snapshot file is written first (pending) and
 * only becomes visible once its header is appended to the index (committed).
 * Commits run one at a time through `commitQueue`, and a commit aborts if
 * the index changed on disk while its snapshot file was being written.
 */
@Injectable()
export class SnapshotStoreService {
  private readonly logger = new Logger(SnapshotStoreService.name);
  private readonly indexPath: string;
  private commitQueue: Promise<void> = Promise.resolve();

  constructor(
    @Inject(SNAPSHOT_STORE_DIR) private readonly storeDir: string,
    private readonly validationService: BuildValidationService,
  ) {
    this.indexPath = path.join(storeDir, 'index.json');
  }

  createSnapshot(
    build: BuildResult,
    options: SnapshotOptions = {},
  ): Promise<SnapshotHeader> {
    return this.serialize(() => this.commit(build, options));
  }

  async listSnapshots(): Promise<SnapshotHeader[]> {
    const index = await this.readIndex();
    return deepFreeze(index.snapshots);
  }

  async latestSnapshot(): Promise<SnapshotHeader | null> {
    const snapshots = await this.listSnapshots();
    return snapshots[snapshots.length - 1] ?? null;
  }

  async getSnapshot(id: string): Promise<Snapshot | null> {
    const snapshots = await this.listSnapshots();
    const header = snapshots.find((snapshot) => snapshot.id === id);
    if (!header) {
      return null;
    }
    const snapshot = await this.readStore(() =>
      readJsonFile<Snapshot>(this.snapshotPath(header.id)),
    );
    return snapshot ? deepFreeze(snapshot) : null;
  }

  async findByBuildId(buildId: string): Promise<Snapshot | null> {
    const snapshots = await this.listSnapshots();
    const header = [...snapshots]
      .reverse()
      .find((snapshot) => snapshot.buildId === buildId);
    return header ? this.getSnapshot(header.id) : null;
  }

  /** Committed scores of one theme, oldest first. */
  async getHistory(themeName: string): Promise<HistoryPoint[]> {
    const snapshots = await this.listSnapshots();
    return snapshots
      .filter((snapshot) =>
        Object.prototype.hasOwnProperty.call(snapshot.themeScores, themeName),
      )
      .map((snapshot) => ({
        label: snapshot.label,
        score: snapshot.themeScores[themeName],
        snapshotId: snapshot.id,
        sequence: snapshot.sequence,
        createdAt: snapshot.createdAt,
        scoringVersion: snapshot.scoringVersion,
      }));
  }

  /** Movement scores from the last `limit` snapshots of a version, oldest first. */
  async movementScoreHistory(
    scoringVersion: string,
    limit: number,
  ): Promise<Map<string, number[]>> {
    const headers = (await this.listSnapshots())
      .filter((snapshot) => snapshot.scoringVersion === scoringVersion)
      .slice(-limit);
    const history = new Map<string, number[]>();
    for (const header of headers) {
      const snapshot = await this.getSnapshot(header.id);
      for (const movement of snapshot?.build.movements ?? []) {
        history.set(movement.id, [
          ...(history.get(movement.id) ?? []),
          movement.score.value,
        ]);
      }
    }
    return history;
  }

  /**
   * Weights committed under a scoring version may not change without a new
   * version, otherwise history would compare incompatible scores.
   */
  async assertScoringVersion(
    scoringVersion: string,
    fingerprint: string,
  ): Promise<void> {
    const snapshots = await this.listSnapshots();
    const conflict = snapshots.find(
      (snapshot) =>
        snapshot.scoringVersion === scoringVersion &&
        snapshot.weightsFingerprint !== fingerprint,
    );
    if (conflict) {
      throw new ConfigurationError(
        'weights changed without bumping scoringVersion',
        {
          scoringVersion,
          committedSnapshot: conflict.id,
        },
      );
    }
  }

  private async commit(
    build: BuildResult,
    options: SnapshotOptions,
  ): Promise<SnapshotHeader> {
    this.validationService.assertComplete(build);

    const label = (options.label ?? '').trim() || quarterLabel(build.asOf);
    if (!LABEL_RE.test(label)) {
      throw new ConfigurationError('invalid snapshot label', { label });
    }

    const index = await this.readIndex();
    if (
      !options.allowRelabel &&
      index.snapshots.some((snapshot) => snapshot.label === label)
    ) {
      throw new SnapshotLabelConflictError(label, build.buildId);
    }

    const sequence =
      index.snapshots.reduce((max, s) => Math.max(max, s.sequence), 0) + 1;
    const header: SnapshotHeader = {
      id: `${label}-${String(sequence).padStart(4, '0')}`,
      label,
      sequence,
      createdAt: new Date().toISOString(),
      status: 'pending',
      buildId: build.buildId,
      scoringVersion: build.meta.scoringVersion,
      weightsFingerprint: build.meta.weightsFingerprint,
      distanceThreshold: build.meta.distanceThreshold,
      themeScores: Object.fromEntries(
        build.themes.map((theme) => [theme.name, theme.score.value]),
      ),
    };
    const committed: SnapshotHeader = { ...header, status: 'committed' };
    const filePath = this.snapshotPath(header.id);
    this.logger.log(
      `snapshot pending: id=${header.id} build=${build.buildId} themes=${build.themes.length} movements=${build.movements.length}`,
    );

    try {
      if (await fileExists(filePath)) {
        throw new Error(`snapshot file already exists: ${header.id}`);
      }
      await writeJsonAtomic(filePath, { ...committed, build });
    } catch (error) {
      throw new SnapshotStoreError(
        'snapshot write failed',
        build.buildId,
        error,
      );
    }

    try {
      // Commits queue within this process only; another process may have
      // appended since the index was read.
      const current = await this.readIndex();
      if (JSON.stringify(current) !== JSON.stringify(index)) {
        throw new Error('index changed by another writer');
      }
      await writeJsonAtomic(this.indexPath, {
        snapshots: [...index.snapshots, committed],
      });
    } catch (error) {
      // never indexed, so never visible; drop the orphaned file
      await fs.unlink(filePath).catch(() => undefined);
      throw new SnapshotStoreError(
        'snapshot index update failed',
        build.buildId,
        error,
      );
    }

    this.logger.log(
      `snapshot committed: id=${committed.id} label=${label} sequence=${sequence} scoringVersion=${committed.scoringVersion}`,
    );
    return deepFreeze(committed);
  }

  private async readIndex(): Promise<SnapshotIndex> {
    const index = await this.readStore(() =>
      readJsonFile<SnapshotIndex>(this.indexPath),
    );
    return { snapshots: [...(index?.snapshots ?? [])] };
  }

  private async readStore<T>(read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw new SnapshotStoreError('snapshot store read failed', '', error);
    }
  }

  private snapshotPath(id: string): string {
    return path.join(this.storeDir, `${id}.json`);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.commitQueue.then(task);
    this.commitQueue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
