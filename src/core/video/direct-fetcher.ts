// src/core/video/direct-fetcher.ts
import { ErrorCode, PipelineError } from '../errors.js';
import { DEFAULT_DOWNLOAD_TIMEOUT, DEFAULT_USER_AGENT } from '../config/constants.js';
import { describeUrl, discardBody, fetchWithTimeout, releaseAndFail } from '../utils/http.js';
import type { ResolutionMethod, VideoAsset } from '../types/index.js';

export interface VideoFetcher {
  download(url: string, postId: string, method: ResolutionMethod): Promise<VideoAsset>;
}

/**
 * Plain HTTP GET of a media URL. CDN links expire, so 403/404/410 here
 * usually means "ask the fallback for a fresh one".
 */
export class DirectFetcher implements VideoFetcher {
  constructor(private readonly timeoutMs: number = DEFAULT_DOWNLOAD_TIMEOUT) {}

  async download(url: string, postId: string, method: ResolutionMethod): Promise<VideoAsset> {
    if (!isHttpUrl(url)) {
      throw new PipelineError(ErrorCode.PERMANENT_RESOLUTION_FAILURE, `Not an http(s) media URL: ${url}`);
    }

    const response = await fetchWithTimeout(
      url,
      { method: 'GET', headers: { 'User-Agent': DEFAULT_USER_AGENT }, redirect: 'follow' },
      this.timeoutMs
    );
    if (!response.ok) {
      throw await releaseAndFail(response, `Video download from ${describeUrl(url)}`);
    }

    const contentType = (response.headers.get('content-type') ?? 'video/mp4').split(';')[0].trim();
    // An expired link often comes back as a 200 login or error page
    if (contentType === 'text/html') {
      await discardBody(response);
      throw new PipelineError(
        ErrorCode.PERMANENT_RESOLUTION_FAILURE,
        `Video download from ${describeUrl(url)} returned an HTML page`
      );
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new PipelineError(
        ErrorCode.PERMANENT_RESOLUTION_FAILURE,
        `Video download from ${describeUrl(url)} returned an empty body`
      );
    }

    return { postId, bytes, contentType, sourceUrl: url, method };
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}
