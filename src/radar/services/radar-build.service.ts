import { Injectable, Logger } from '@nestjs/common';
import { PERSISTENCE_WINDOW } from '../config/radar.constants';
import {
  resolveRadarConfig,
  weightsFingerprint,
} from '../config/radar-config';
import { ConfigurationError, SnapshotStoreError } from '../errors/radar.errors';
import {
  BuildResult,
  NormalizedItem,
  RadarConfig,
  RadarConfigOverrides,
  SnapshotHeader,
  SnapshotOptions,
} from '../types/radar.types';
import { parseDateToIso } from '../utils/date.util';
import { createDistanceMetric } from '../utils/distance-metrics.util';
import { shortHash } from '../utils/hash.util';
import { AuditTrailBuilder, AuditTrailService } from './audit-trail.service';
import { BuildStorageService } from './build-storage.service';
import { ItemNormalizerService } from './item-normalizer.service';
import { MovementClusteringService } from './movement-clustering.service';
import { MovementScoringService } from './movement-scoring.service';
import { RadarSummaryService } from './radar-summary.service';
import { SnapshotStoreService } from './snapshot-store.service';

export interface BuildOptions {
  items?: readonly unknown[];
  overrides?: RadarConfigOverrides;
  asOf?: string;
  buildId?: string;
}

@Injectable()
export class RadarBuildService {
  private readonly logger = new Logger(RadarBuildService.name);
  private readonly inFlightBuilds = new Map<string, Promise<BuildResult>>();
  private latestBuild: BuildResult | null = null;

  constructor(
    private readonly normalizerService: ItemNormalizerService,
    private readonly clusteringService: MovementClusteringService,
    private readonly scoringService: MovementScoringService,
    private readonly auditTrailService: AuditTrailService,
    private readonly summaryService: RadarSummaryService,
    private readonly snapshotStore: SnapshotStoreService,
    private readonly buildStorage: BuildStorageService,
  ) {}

  /**
   * Runs Normalize -> Cluster -> Score -> Audit as one batch. Identical
   * concurrent inbox builds share one run; builds with explicit items always
   * run on their own.
   */
  async runBuild(options: BuildOptions = {}): Promise<BuildResult> {
    if (options.items) {
      return this.runBuildCore(options);
    }
    const lockKey = JSON.stringify({
      overrides: options.overrides ?? {},
      asOf: options.asOf ?? null,
      buildId: options.buildId ?? null,
    });
    const inFlight = this.inFlightBuilds.get(lockKey);
    if (inFlight) {
      return inFlight;
    }

    const task = this.runBuildCore(options);
    this.inFlightBuilds.set(lockKey, task);
    try {
      return await task;
    } finally {
      if (this.inFlightBuilds.get(lockKey) === task) {
        this.inFlightBuilds.delete(lockKey);
      }
    }
  }

  async getLatestBuild(): Promise<BuildResult | null> {
    if (this.latestBuild) {
      return this.latestBuild;
    }
    this.latestBuild = await this.buildStorage.loadLatestBuild();
    return this.latestBuild;
  }

  /**
   * Commits the latest build as a snapshot. On a store failure the build
   * stays in memory so the commit can be retried.
   */
  async snapshotLatest(options: SnapshotOptions = {}): Promise<SnapshotHeader | null> {
    const build = await this.getLatestBuild();
    if (!build) {
      return null;
    }
    try {
      return await this.snapshotStore.createSnapshot(build, options);
    } catch (error) {
      if (error instanceof SnapshotStoreError) {
        this.logger.error(
          `snapshot commit failed, build kept in memory for retry: build=${build.buildId} ${error.message}`,
        );
      }
      throw error;
    }
  }

  private async runBuildCore(options: BuildOptions): Promise<BuildResult> {
    const startedAt = Date.now();
    const config = resolveRadarConfig(options.overrides);
    const fingerprint = weightsFingerprint(config);
    await this.snapshotStore.assertScoringVersion(
      config.scoringVersion,
      fingerprint,
    );
    const explicitAsOf = this.parseAsOf(options.asOf);

    const rawItems = options.items ?? (await this.buildStorage.loadRawItems());
    this.logger.log(
      `build start: items=${rawItems.length} scoringVersion=${config.scoringVersion} threshold=${config.distanceThreshold} metric=${config.distanceMetric} linkage=${config.linkage} dayWindow=${config.dayWindow}`,
    );

    const normalized = this.normalizerService.normalize(rawItems);
    this.logger.log(
      `stage normalize done: accepted=${normalized.items.length} rejected=${normalized.rejected.length} duplicates=${normalized.duplicates}`,
    );

    const items = normalized.items;
    const asOf =
      explicitAsOf ||
      (items.length > 0
        ? items[items.length - 1].date
        : new Date().toISOString());
    const buildId =
      options.buildId ?? this.fingerprintBuild(items, config, asOf);

    const clusters = this.clusteringService.cluster(
      items,
      {
        distanceThreshold: config.distanceThreshold,
        dayWindow: config.dayWindow,
        temporalWeight: config.temporalWeight,
        linkage: config.linkage,
        metric: createDistanceMetric(config.distanceMetric),
      },
      config.themes,
      config.fallbackTheme,
    );
    this.logger.log(
      `stage cluster done: build=${buildId} movements=${clusters.length} elapsedMs=${Date.now() - startedAt}`,
    );

    const itemsById = new Map(items.map((item) => [item.eventUid, item]));
    const priorScores = config.factors.includes('persistence')
      ? await this.snapshotStore.movementScoreHistory(
          config.scoringVersion,
          PERSISTENCE_WINDOW,
        )
      : undefined;
    const context = {
      asOfMs: Date.parse(asOf),
      config,
      itemsById,
      priorScores,
    };
    const movements = clusters.map((cluster) =>
      this.scoringService.scoreMovement(cluster, context),
    );

    const committed = await this.snapshotStore.listSnapshots();
    const themes = this.scoringService.scoreThemes(
      movements,
      config,
      (themeName) => {
        for (let i = committed.length - 1; i >= 0; i -= 1) {
          const snapshot = committed[i];
          if (
            snapshot.scoringVersion === config.scoringVersion &&
            Object.prototype.hasOwnProperty.call(snapshot.themeScores, themeName)
          ) {
            return snapshot.themeScores[themeName];
          }
        }
        return null;
      },
    );
    this.logger.log(
      `stage score done: build=${buildId} themes=${themes.length} elapsedMs=${Date.now() - startedAt}`,
    );

    const auditBuilder = new AuditTrailBuilder(buildId);
    movements.forEach((movement) =>
      auditBuilder.record(movement.id, 'movement', movement.score.breakdown),
    );
    themes.forEach((theme) =>
      auditBuilder.record(theme.id, 'theme', theme.score.breakdown),
    );
    const trail = auditBuilder.finalize();
    this.auditTrailService.register(trail);

    const result: BuildResult = {
      buildId,
      builtAt: new Date().toISOString(),
      asOf,
      meta: {
        scoringVersion: config.scoringVersion,
        weightsFingerprint: fingerprint,
        factors: [...config.factors],
        weights: { ...config.weights },
        distanceThreshold: config.distanceThreshold,
        distanceMetric: config.distanceMetric,
        linkage: config.linkage,
        dayWindow: config.dayWindow,
        temporalWeight: config.temporalWeight,
        aggregator: config.aggregator,
        topK: config.topK,
        itemsIn: rawItems.length,
        itemsAccepted: items.length,
        itemsRejected: normalized.rejected.length,
        duplicates: normalized.duplicates,
        movementCount: movements.length,
        themeCount: themes.length,
      },
      movements,
      themes,
      audit: [...trail.entries],
      rejected: normalized.rejected,
      summary: this.summaryService.summarize(themes),
    };

    this.latestBuild = result;
    try {
      await this.buildStorage.saveLatestBuild(result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `latest build not persisted, kept in memory: build=${buildId} ${message}`,
      );
    }

    this.logger.log(
      `build done: build=${buildId} movements=${movements.length} themes=${themes.length} auditEntries=${result.audit.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return result;
  }

  private parseAsOf(value: string | undefined): string {
    if (value == null || value === '') {
      return '';
    }
    const iso = parseDateToIso(value);
    if (!iso) {
      throw new ConfigurationError('asOf must be a valid date', {
        asOf: value,
      });
    }
    return iso;
  }

  // Same items, config and reference date always give the same build id.
  private fingerprintBuild(
    items: readonly NormalizedItem[],
    config: RadarConfig,
    asOf: string,
  ): string {
    const itemKeys = items.map((item) =>
      [
        item.eventUid,
        item.date,
        item.title,
        item.summary,
        item.sourceTag,
        item.sourceTier,
      ].join('|'),
    );
    return `b-${shortHash(JSON.stringify({ itemKeys, config, asOf }))}`;
  }
}
