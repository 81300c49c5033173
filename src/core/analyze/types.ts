// src/core/analyze/types.ts
import type { AnalysisOutcome, PipelineRecord, VideoAsset } from '../types/index.js';

export interface ContentAnalyzer {
  /** Never rejects for an external failure; those come back as `status: 'failed'` */
  analyze(asset: VideoAsset, record: PipelineRecord): Promise<AnalysisOutcome>;
}
