// src/core/scrape/types.ts
import type { RawRecord, ScrapingConfig } from '../types/index.js';

export interface ScrapingResult {
  items: RawRecord[];
  datasetId: string;
  totalItems: number;
  executionTimeMs: number;
  config?: ScrapingConfig;
  /** ISO timestamp of when the items were read */
  fetchedAt: string;
}

export interface ScrapingClient {
  /** Starts a run for the config and reads the dataset it produced */
  scrape(config: ScrapingConfig): Promise<ScrapingResult>;
  /** Reads a dataset left by an earlier run */
  fetchDataset(datasetId: string, config?: ScrapingConfig): Promise<ScrapingResult>;
}
