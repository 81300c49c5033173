// src/core/types/index.ts
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Platform = 'instagram' | 'tiktok' | 'youtube' | 'facebook' | 'unknown';

/**
 * Decides which stages a scraped record goes through.
 * `ad` records stop after classification; `content` records continue to
 * video resolution and analysis.
 */
export type ContentType = 'ad' | 'content';

export const CANONICAL_FIELDS = [
  'post_id',
  'post_url',
  'media_url',
  'username',
  'caption',
  'likes',
  'views',
  'comments',
  'shares',
  'duration',
  'posted_at',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

export interface ScrapingConfig {
  readonly name: string;
  readonly actorId: string;
  readonly platform: Platform;
  readonly contentType: ContentType;
  readonly input: Readonly<JsonObject>;
  readonly mapping: ColumnMapping;
  /** Re-read an existing dataset instead of starting a new actor run */
  readonly datasetId?: string;
}

export type RawRecord = Record<string, unknown>;

export type ColumnMappingEntry = readonly [rawKey: string, field: CanonicalField];

export interface ColumnMapping {
  readonly name: string;
  readonly entries: readonly ColumnMappingEntry[];
}

export type NormalizedRecord = Partial<Record<CanonicalField, JsonValue>>;

export type NumericField = 'likes' | 'views' | 'comments' | 'shares' | 'duration';
export type DerivedMetric = 'engagement' | 'engagement_rate';
export type Metric = NumericField | DerivedMetric;

export type ViralThresholds = Readonly<Partial<Record<Metric, number>>>;

export interface Label {
  viral: boolean;
  /** Metric values that were compared; metrics the record lacks are omitted */
  score: Partial<Record<Metric, number>>;
}

export type ResolutionMethod = 'direct' | 'fallback';

export interface VideoAsset {
  postId: string;
  bytes: Buffer;
  contentType: string;
  sourceUrl: string;
  method: ResolutionMethod;
  storageKey?: string;
}

export type VideoOutcome =
  | {
      status: 'resolved';
      method: ResolutionMethod;
      sourceUrl: string;
      contentType: string;
      byteLength: number;
      storageKey?: string;
    }
  | {
      status: 'unresolved';
      reason: string;
      attempts: number;
    };

export interface AnalysisResult {
  model: string;
  videoAnalysis: string;
  viralityAnalysis?: string;
}

export type AnalysisOutcome =
  | { status: 'analyzed'; result: AnalysisResult }
  | { status: 'failed'; reason: string; retryable: boolean };

export interface RecordSource {
  configName: string;
  platform: Platform;
  contentType: ContentType;
  datasetId: string;
  ingestedAt: string;
}

export interface PipelineRecord {
  source: RecordSource;
  fields: NormalizedRecord;
  label?: Label;
  video?: VideoOutcome;
  analysis?: AnalysisOutcome;
}

export interface StageFlags {
  download: boolean;
  analysis: boolean;
  archiveVideos: boolean;
  write: boolean;
}

export interface RetryPolicy {
  /** Total tries per external call; 1 disables retrying */
  attempts: number;
  baseDelayMs: number;
}
