export type SourceTier = 1 | 2 | 3;

// Connector contract. Field names follow the connector wire format.
export interface RawItem {
  event_uid: string;
  date: string;
  title: string;
  url: string;
  raw_text: string;
  source_name?: string;
  source_tier?: number;
  signal_type?: string;
}

export interface NormalizedItem {
  eventUid: string;
  date: string;
  dateMs: number;
  title: string;
  url: string;
  text: string;
  summary: string;
  sourceTag: string;
  sourceTier: SourceTier;
  signalType: string | null;
}

export interface RejectedItem {
  index: number;
  eventUid: string | null;
  reason: string;
}

export interface NormalizeResult {
  items: NormalizedItem[];
  rejected: RejectedItem[];
  duplicates: number;
}

export type DistanceMetricName = 'token-jaccard' | 'shingle-jaccard';

export interface DistanceMetric {
  readonly name: string;
  /** Textual distance in [0,1]; 0 means identical. */
  distance(a: NormalizedItem, b: NormalizedItem): number;
}

export type ClusterLinkage = 'single' | 'average' | 'complete';

export interface ClusterOptions {
  distanceThreshold: number;
  dayWindow: number;
  temporalWeight: number;
  linkage: ClusterLinkage;
  metric: DistanceMetric;
}

export interface MovementItem {
  eventUid: string;
  date: string;
  title: string;
  url: string;
  sourceTag: string;
}

export interface FactorContribution {
  factor: string;
  rawValue: number;
  weight: number;
  contribution: number;
}

export interface Score {
  value: number;
  breakdown: FactorContribution[];
}

export type ConfidenceLabel = 'low' | 'medium' | 'high';

export interface MovementConfidence {
  score: number;
  label: ConfidenceLabel;
  uniqueSources: number;
  tier1Share: number;
}

export interface MovementCluster {
  id: string;
  title: string;
  memberIds: string[];
  items: MovementItem[];
  firstSeen: string;
  lastSeen: string;
  themes: string[];
  sources: string[];
}

export interface Movement extends MovementCluster {
  score: Score;
  confidence: MovementConfidence;
}

export type TrendArrow = 'up' | 'flat' | 'down';

export interface Theme {
  id: string;
  name: string;
  score: Score;
  arrow: TrendArrow;
  previousScore: number | null;
  confidence: ConfidenceLabel;
  movementIds: string[];
  movementCount: number;
  sourceCount: number;
}

export type AuditTargetKind = 'movement' | 'theme';

export interface AuditEntry {
  readonly buildId: string;
  readonly targetId: string;
  readonly targetKind: AuditTargetKind;
  readonly sequence: number;
  readonly factor: string;
  readonly rawValue: number;
  readonly weight: number;
  readonly contribution: number;
}

export type ThemeAggregator = 'max' | 'mean' | 'top-k-mean' | 'weighted-top';

export interface ThemeDefinition {
  name: string;
  keywords: string[];
}

export interface RadarConfig {
  scoringVersion: string;
  factors: string[];
  weights: Record<string, number>;
  distanceThreshold: number;
  distanceMetric: DistanceMetricName;
  linkage: ClusterLinkage;
  dayWindow: number;
  temporalWeight: number;
  aggregator: ThemeAggregator;
  topK: number;
  trendEpsilon: number;
  minMovementCount: number;
  minSourceDiversity: number;
  recencyHorizonDays: number;
  sizeSaturation: number;
  diversitySaturation: number;
  themes: ThemeDefinition[];
  fallbackTheme: string;
}

export type RadarConfigOverrides = Partial<
  Pick<
    RadarConfig,
    | 'scoringVersion'
    | 'weights'
    | 'distanceThreshold'
    | 'distanceMetric'
    | 'linkage'
    | 'dayWindow'
    | 'temporalWeight'
    | 'aggregator'
    | 'topK'
  >
>;

export interface BuildMeta {
  scoringVersion: string;
  weightsFingerprint: string;
  factors: string[];
  weights: Record<string, number>;
  distanceThreshold: number;
  distanceMetric: string;
  linkage: ClusterLinkage;
  dayWindow: number;
  temporalWeight: number;
  aggregator: ThemeAggregator;
  topK: number;
  itemsIn: number;
  itemsAccepted: number;
  itemsRejected: number;
  duplicates: number;
  movementCount: number;
  themeCount: number;
}

export interface RadarSummary {
  executiveSummary: string;
  discussionTopics: string;
}

export interface BuildResult {
  buildId: string;
  builtAt: string;
  asOf: string;
  meta: BuildMeta;
  movements: Movement[];
  themes: Theme[];
  audit: AuditEntry[];
  rejected: RejectedItem[];
  summary: RadarSummary;
}

export type SnapshotStatus = 'pending' | 'committed';

export interface SnapshotHeader {
  id: string;
  label: string;
  sequence: number;
  createdAt: string;
  status: SnapshotStatus;
  buildId: string;
  scoringVersion: string;
  weightsFingerprint: string;
  distanceThreshold: number;
  themeScores: Record<string, number>;
}

export interface Snapshot extends SnapshotHeader {
  build: BuildResult;
}

export interface SnapshotOptions {
  label?: string;
  allowRelabel?: boolean;
}

export interface HistoryPoint {
  label: string;
  score: number;
  snapshotId: string;
  sequence: number;
  createdAt: string;
  scoringVersion: string;
}
