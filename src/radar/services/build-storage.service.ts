import { Inject, Injectable, Logger } from '@nestjs/common';
import { BUILD_STORE_PATHS } from '../config/radar.constants';
import { BuildResult } from '../types/radar.types';
import { safeReadJson, writeJsonAtomic } from '../utils/json-file.util';

export interface BuildStorePaths {
  itemsPath: string;
  latestBuildPath: string;
}

@Injectable()
export class BuildStorageService {
  private readonly logger = new Logger(BuildStorageService.name);

  constructor(
    @Inject(BUILD_STORE_PATHS) private readonly paths: BuildStorePaths,
  ) {}

  /** Connector inbox: a JSON array of raw items, or `{ items: [...] }`. */
  async loadRawItems(): Promise<unknown[]> {
    const payload = await safeReadJson<unknown>(this.paths.itemsPath);
    if (Array.isArray(payload)) {
      return payload;
    }
    if (
      payload !== null &&
      typeof payload === 'object' &&
      'items' in payload &&
      Array.isArray(payload.items)
    ) {
      return payload.items;
    }
    this.logger.warn(`raw item inbox empty or unreadable: ${this.paths.itemsPath}`);
    return [];
  }

  async loadLatestBuild(): Promise<BuildResult | null> {
    return safeReadJson<BuildResult>(this.paths.latestBuildPath);
  }

  async saveLatestBuild(build: BuildResult): Promise<void> {
    await writeJsonAtomic(this.paths.latestBuildPath, build);
  }
}
