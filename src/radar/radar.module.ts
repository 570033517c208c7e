import { Module } from '@nestjs/common';
import {
  BUILD_STORE_PATHS,
  ITEMS_JSON,
  LATEST_BUILD_JSON,
  SNAPSHOTS_DIR,
  SNAPSHOT_STORE_DIR,
} from './config/radar.constants';
import { RadarController } from './radar.controller';
import { AuditTrailService } from './services/audit-trail.service';
import {
  BuildStorageService,
  BuildStorePaths,
} from './services/build-storage.service';
import { BuildValidationService } from './services/build-validation.service';
import { ItemNormalizerService } from './services/item-normalizer.service';
import { MovementClusteringService } from './services/movement-clustering.service';
import { MovementScoringService } from './services/movement-scoring.service';
import { RadarBuildService } from './services/radar-build.service';
import { RadarSummaryService } from './services/radar-summary.service';
import { SnapshotStoreService } from './services/snapshot-store.service';

const buildStorePaths: BuildStorePaths = {
  itemsPath: ITEMS_JSON,
  latestBuildPath: LATEST_BUILD_JSON,
};

@Module({
  controllers: [RadarController],
  providers: [
    { provide: SNAPSHOT_STORE_DIR, useValue: SNAPSHOTS_DIR },
    { provide: BUILD_STORE_PATHS, useValue: buildStorePaths },
    RadarBuildService,
    ItemNormalizerService,
    MovementClusteringService,
    MovementScoringService,
    AuditTrailService,
    BuildValidationService,
    SnapshotStoreService,
    BuildStorageService,
    RadarSummaryService,
  ],
  exports: [RadarBuildService, SnapshotStoreService],
})
export class RadarModule {}
