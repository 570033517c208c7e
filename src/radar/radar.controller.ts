import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  CLUSTER_LINKAGES,
  DISTANCE_METRIC_NAMES,
  SERVICE_NAME,
  THEME_AGGREGATORS,
  parseWeightsCsv,
} from './config/radar.constants';
import {
  ConfigurationError,
  IncompleteBuildError,
  SnapshotLabelConflictError,
} from './errors/radar.errors';
import { AuditTrailService } from './services/audit-trail.service';
import { RadarBuildService } from './services/radar-build.service';
import { SnapshotStoreService } from './services/snapshot-store.service';
import {
  AuditEntry,
  BuildResult,
  HistoryPoint,
  RadarConfigOverrides,
  Snapshot,
  SnapshotHeader,
} from './types/radar.types';
import { scoreFromContributions } from './utils/score.util';

type RequestBody = Record<string, unknown> | undefined;

@Controller()
export class RadarController {
  constructor(
    private readonly buildService: RadarBuildService,
    private readonly snapshotStore: SnapshotStoreService,
    private readonly auditTrailService: AuditTrailService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Post('builds')
  async runBuild(@Body() body?: RequestBody): Promise<BuildResult> {
    return this.handle(() =>
      this.buildService.runBuild({
        items: this.parseItems(body?.items),
        overrides: this.parseOverrides(body ?? {}),
        asOf: this.parseString(body?.asOf, 'asOf'),
      }),
    );
  }

  @Get('builds/latest')
  async getLatestBuild(): Promise<BuildResult> {
    const build = await this.buildService.getLatestBuild();
    if (!build) {
      throw new NotFoundException('no build has run yet');
    }
    return build;
  }

  @Get('builds/:buildId/audit/:targetId')
  async getAudit(
    @Param('buildId') buildId: string,
    @Param('targetId') targetId: string,
  ): Promise<{
    buildId: string;
    targetId: string;
    score: number;
    entries: AuditEntry[];
  }> {
    const entries = await this.auditTrailService.explain(buildId, targetId);
    if (entries.length === 0) {
      throw new NotFoundException(
        `no audit entries for ${targetId} in build ${buildId}`,
      );
    }
    return {
      buildId,
      targetId,
      score: scoreFromContributions(entries),
      entries,
    };
  }

  @Post('snapshots')
  async createSnapshot(@Body() body?: RequestBody): Promise<SnapshotHeader> {
    const label = this.parseString(body?.label, 'label');
    const allowRelabel = this.parseBoolean(body?.allowRelabel, 'allowRelabel');
    const header = await this.handle(() =>
      this.buildService.snapshotLatest({ label, allowRelabel }),
    );
    if (!header) {
      throw new NotFoundException('no build to snapshot');
    }
    return header;
  }

  @Get('snapshots')
  async listSnapshots(): Promise<SnapshotHeader[]> {
    return this.snapshotStore.listSnapshots();
  }

  @Get('snapshots/:id')
  async getSnapshot(@Param('id') id: string): Promise<Snapshot> {
    const snapshot = await this.snapshotStore.getSnapshot(id);
    if (!snapshot) {
      throw new NotFoundException(`snapshot not found: ${id}`);
    }
    return snapshot;
  }

  @Get('history/:theme')
  async getHistory(
    @Param('theme') theme: string,
  ): Promise<{ theme: string; points: HistoryPoint[] }> {
    return {
      theme,
      points: await this.snapshotStore.getHistory(theme),
    };
  }

  private async handle<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof IncompleteBuildError) {
        throw new UnprocessableEntityException(error.message);
      }
      if (error instanceof SnapshotLabelConflictError) {
        throw new ConflictException(error.message);
      }
      throw error;
    }
  }

  private parseOverrides(body: Record<string, unknown>): RadarConfigOverrides {
    return {
      scoringVersion: this.parseString(body.scoringVersion, 'scoringVersion'),
      weights: this.parseWeights(body.weights),
      distanceThreshold: this.parseNumber(
        body.distanceThreshold,
        'distanceThreshold',
      ),
      distanceMetric: this.parseChoice(
        body.distanceMetric,
        DISTANCE_METRIC_NAMES,
        'distanceMetric',
      ),
      linkage: this.parseChoice(body.linkage, CLUSTER_LINKAGES, 'linkage'),
      dayWindow: this.parseNumber(body.dayWindow, 'dayWindow'),
      temporalWeight: this.parseNumber(body.temporalWeight, 'temporalWeight'),
      aggregator: this.parseChoice(
        body.aggregator,
        THEME_AGGREGATORS,
        'aggregator',
      ),
      topK: this.parseNumber(body.topK, 'topK'),
    };
  }

  private parseItems(value: unknown): unknown[] | undefined {
    if (value == null) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      throw new BadRequestException('items must be an array');
    }
    return value;
  }

  private parseString(value: unknown, fieldName: string): string | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new BadRequestException(`${fieldName} must be a string`);
    }
    return value.trim();
  }

  private parseNumber(value: unknown, fieldName: string): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new BadRequestException(`${fieldName} must be a number`);
    }
    return parsed;
  }

  private parseChoice<T extends string>(
    value: unknown,
    allowed: readonly T[],
    fieldName: string,
  ): T | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const choice = allowed.find((option) => option === value);
    if (!choice) {
      throw new BadRequestException(
        `${fieldName} must be one of ${allowed.join(', ')}`,
      );
    }
    return choice;
  }

  private parseWeights(value: unknown): Record<string, number> | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value === 'string') {
      return parseWeightsCsv(value);
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw new BadRequestException('weights must be an object');
    }
    const weights: Record<string, number> = {};
    for (const [factor, weight] of Object.entries(value)) {
      if (typeof weight !== 'number') {
        throw new BadRequestException(`weight for ${factor} must be a number`);
      }
      weights[factor] = weight;
    }
    return weights;
  }

  private parseBoolean(value: unknown, fieldName: string): boolean {
    if (value == null || value === '') {
      return false;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
    }
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n'].includes(lowered)) {
        return false;
      }
    }

    throw new BadRequestException(`${fieldName} must be a boolean value`);
  }
}
