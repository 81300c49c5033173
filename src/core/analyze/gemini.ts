// src/core/analyze/gemini.ts
import { unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { GoogleAIFileManager } from '@google/generative-ai/server';
import { ErrorCode, PipelineError } from '../errors.js';
import {
  APP_NAME,
  DEFAULT_RETRY,
  GEMINI_DEFAULT_MODEL,
  GEMINI_FILE_POLL_ATTEMPTS,
  GEMINI_FILE_POLL_INTERVAL_MS,
  GEMINI_INLINE_LIMIT_BYTES,
} from '../config/constants.js';
import { sleep, withRetry } from '../utils/retry.js';
import type { AnalysisOutcome, PipelineRecord, RetryPolicy, VideoAsset } from '../types/index.js';
import { buildViralityPrompt, VIDEO_ANALYSIS_PROMPT } from './prompts.js';
import type { ContentAnalyzer } from './types.js';

export type ContentPart =
  | { text: string }
  | { inlineData: { data: string; mimeType: string } }
  | { fileData: { mimeType: string; fileUri: string } };

/** The slice of the SDK's GenerativeModel this analyzer uses */
export interface ModelClient {
  generateContent(parts: ContentPart[]): Promise<{ response: { text(): string } }>;
}

export interface UploadedFile {
  name: string;
  uri: string;
  mimeType: string;
  state: string;
}

/** The slice of the SDK's GoogleAIFileManager this analyzer uses */
export interface FileClient {
  uploadFile(filePath: string, metadata: { mimeType: string; displayName?: string }): Promise<{ file: UploadedFile }>;
  getFile(name: string): Promise<UploadedFile>;
  deleteFile(name: string): Promise<void>;
}

export interface GeminiAnalyzerOptions {
  apiKey: string;
  model?: string;
  explainVirality?: boolean;
  retry?: RetryPolicy;
  verbose?: boolean;
  modelClient?: ModelClient;
  fileClient?: FileClient;
  wait?: (ms: number) => Promise<void>;
}

const RETRYABLE_STATUS = new Set([429, 500, 503]);
const RETRYABLE_MESSAGE = /overloaded|unavailable|rate limit|resource has been exhausted|quota/i;

export class GeminiContentAnalyzer implements ContentAnalyzer {
  readonly model: string;
  private readonly modelClient: ModelClient;
  private readonly fileClient: FileClient;
  private readonly retry: RetryPolicy;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: GeminiAnalyzerOptions) {
    this.model = options.model ?? GEMINI_DEFAULT_MODEL;
    this.modelClient =
      options.modelClient ?? new GoogleGenerativeAI(options.apiKey).getGenerativeModel({ model: this.model });
    this.fileClient = options.fileClient ?? new GoogleAIFileManager(options.apiKey);
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.wait = options.wait ?? sleep;
  }

  async analyze(asset: VideoAsset, record: PipelineRecord): Promise<AnalysisOutcome> {
    let uploaded: UploadedFile | undefined;

    try {
      let videoPart: ContentPart;
      if (asset.bytes.length <= GEMINI_INLINE_LIMIT_BYTES) {
        videoPart = { inlineData: { data: asset.bytes.toString('base64'), mimeType: asset.contentType } };
      } else {
        uploaded = await this.upload(asset);
        videoPart = { fileData: { mimeType: uploaded.mimeType, fileUri: uploaded.uri } };
      }

      const videoAnalysis = await this.generate([videoPart, { text: VIDEO_ANALYSIS_PROMPT }], asset.postId);
      this.log(`${asset.postId}: video analysis ${videoAnalysis.length} chars`);

      if (!this.options.explainVirality) {
        return { status: 'analyzed', result: { model: this.model, videoAnalysis } };
      }

      const viralityAnalysis = await this.generate(
        [{ text: buildViralityPrompt(record.fields, record.label, videoAnalysis) }],
        asset.postId
      );
      return { status: 'analyzed', result: { model: this.model, videoAnalysis, viralityAnalysis } };
    } catch (error) {
      const failure = toAnalysisError(error);
      this.log(`${asset.postId}: ${failure.message}`);
      return { status: 'failed', reason: failure.message, retryable: failure.retryable };
    } finally {
      if (uploaded) {
        await this.removeUpload(uploaded);
      }
    }
  }

  private async generate(parts: ContentPart[], postId: string): Promise<string> {
    const text = await withRetry(
      async () => {
        try {
          const result = await this.modelClient.generateContent(parts);
          return result.response.text();
        } catch (error) {
          throw toAnalysisError(error);
        }
      },
      this.retry,
      {
        wait: this.wait,
        onRetry: (error, attempt, delayMs) =>
          this.log(`${postId}: attempt ${attempt} failed (${String(error)}), retrying in ${delayMs}ms`),
      }
    );

    if (text.trim().length === 0) {
      throw new PipelineError(ErrorCode.PARTIAL_RECORD_FAILURE, 'Gemini returned no text (possibly blocked by safety filters)');
    }
    return text;
  }

  /** Large videos go through the file API; the SDK uploads from a path */
  private async upload(asset: VideoAsset): Promise<UploadedFile> {
    const tempPath = path.join(os.tmpdir(), `${APP_NAME}-${asset.postId}-${Date.now()}.mp4`);
    await writeFile(tempPath, asset.bytes);

    let file: UploadedFile;
    try {
      const response = await this.fileClient.uploadFile(tempPath, {
        mimeType: asset.contentType,
        displayName: asset.postId,
      });
      file = response.file;
    } finally {
      await unlink(tempPath).catch((error: unknown) => this.log(`could not remove ${tempPath}: ${String(error)}`));
    }

    for (let poll = 0; file.state === 'PROCESSING'; poll++) {
      if (poll >= GEMINI_FILE_POLL_ATTEMPTS) {
        await this.removeUpload(file);
        throw new PipelineError(
          ErrorCode.TRANSIENT_EXTERNAL_FAILURE,
          `Uploaded video ${file.name} still processing after ${GEMINI_FILE_POLL_ATTEMPTS} checks`,
          true
        );
      }
      this.log(`${asset.postId}: waiting for ${file.name} to be processed`);
      await this.wait(GEMINI_FILE_POLL_INTERVAL_MS);
      file = await this.fileClient.getFile(file.name);
    }

    if (file.state !== 'ACTIVE') {
      await this.removeUpload(file);
      throw new PipelineError(ErrorCode.PARTIAL_RECORD_FAILURE, `Uploaded video ${file.name} ended in state ${file.state}`);
    }
    return file;
  }

  private async removeUpload(file: UploadedFile): Promise<void> {
    try {
      await this.fileClient.deleteFile(file.name);
    } catch (error) {
      this.log(`could not delete uploaded ${file.name}: ${String(error)}`);
    }
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[Analyze] ${message}`);
    }
  }
}

/** Maps SDK and HTTP failures onto the pipeline's error taxonomy */
export function toAnalysisError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;
  const retryable = (status !== undefined && RETRYABLE_STATUS.has(status)) || RETRYABLE_MESSAGE.test(message);

  return new PipelineError(
    retryable ? ErrorCode.TRANSIENT_EXTERNAL_FAILURE : ErrorCode.PARTIAL_RECORD_FAILURE,
    `Gemini request failed: ${message}`,
    retryable,
    undefined,
    status !== undefined ? { status } : undefined
  );
}
