// src/core/video/__tests__/direct-fetcher.test.ts
import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { ReadableStream } from 'node:stream/web';
import { DirectFetcher } from '../direct-fetcher.js';
import { ErrorCode } from '../../errors.js';

describe('DirectFetcher', () => {
  const originalFetch = global.fetch;
  let fetchMock: ReturnType<typeof jest.fn<typeof fetch>>;

  beforeEach(() => {
    fetchMock = jest.fn<typeof fetch>();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('downloads the bytes and records provenance', async () => {
    fetchMock.mockResolvedValue(
      new Response(Buffer.from('fake-mp4'), { status: 200, headers: { 'Content-Type': 'video/mp4; codecs=avc1' } })
    );

    const asset = await new DirectFetcher(1000).download('https://cdn.example.com/v.mp4', 'ABC', 'direct');

    expect(asset.postId).toBe('ABC');
    expect(asset.bytes.toString()).toBe('fake-mp4');
    expect(asset.contentType).toBe('video/mp4');
    expect(asset.sourceUrl).toBe('https://cdn.example.com/v.mp4');
    expect(asset.method).toBe('direct');
  });

  it('treats an expired link as a non-retryable failure', async () => {
    fetchMock.mockResolvedValue(new Response('Forbidden', { status: 403 }));

    await expect(new DirectFetcher().download('https://cdn.example.com/v.mp4', 'ABC', 'direct')).rejects.toMatchObject({
      retryable: false,
      message: 'Video download from cdn.example.com/v.mp4 returned HTTP 403',
    });
  });

  it('cancels the body of a failed download', async () => {
    const cancel = jest.fn<(reason?: unknown) => void>();
    fetchMock.mockResolvedValue(new Response(new ReadableStream<Uint8Array>({ cancel }), { status: 403 }));

    await expect(new DirectFetcher().download('https://cdn.example.com/v.mp4', 'ABC', 'direct')).rejects.toThrow(
      'Video download from cdn.example.com/v.mp4 returned HTTP 403'
    );
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('rejects HTML bodies served with 200', async () => {
    fetchMock.mockResolvedValue(
      new Response('<html>login</html>', { status: 200, headers: { 'Content-Type': 'text/html; charset=utf-8' } })
    );

    await expect(new DirectFetcher().download('https://cdn.example.com/v.mp4', 'ABC', 'direct')).rejects.toMatchObject({
      code: ErrorCode.PERMANENT_RESOLUTION_FAILURE,
      message: 'Video download from cdn.example.com/v.mp4 returned an HTML page',
    });
  });

  it('rejects empty bodies', async () => {
    fetchMock.mockResolvedValue(new Response(new Uint8Array(0), { status: 200, headers: { 'Content-Type': 'video/mp4' } }));

    await expect(new DirectFetcher().download('https://cdn.example.com/v.mp4', 'ABC', 'direct')).rejects.toThrow(
      'returned an empty body'
    );
  });

  it('refuses non-http urls without a request', async () => {
    await expect(new DirectFetcher().download('ftp://cdn.example.com/v.mp4', 'ABC', 'direct')).rejects.toThrow(
      'Not an http(s) media URL: ftp://cdn.example.com/v.mp4'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
