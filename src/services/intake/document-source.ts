import { config } from '../../config';
import { DownloadError } from '../../errors';
import type { OriginMetadata } from '../authenticity/authenticity-scorer';

export interface FetchedDocument {
  bytes: Buffer;
  origin: OriginMetadata;
  finalUrl: string;
}

export interface DocumentSource {
  fetch(fileUrl: string): Promise<FetchedDocument>;
}

function parseContentLength(header: string | null): number | null {
  if (header === null) return null;
  const value = Number.parseInt(header, 10);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

/** Downloads the submitted file over HTTP(S), keeping the transport headers for the authenticity check. */
export class HttpDocumentSource implements DocumentSource {
  constructor(private readonly timeoutMs: number = config.DOWNLOAD_TIMEOUT_MS) {}

  async fetch(fileUrl: string): Promise<FetchedDocument> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(fileUrl, { method: 'GET', redirect: 'follow', signal: controller.signal });
      if (!res.ok) {
        throw new DownloadError(`Download of ${fileUrl} failed with HTTP ${res.status}`, res.status);
      }
      const bytes = Buffer.from(await res.arrayBuffer());
      if (bytes.length === 0) {
        throw new DownloadError(`Download of ${fileUrl} returned an empty body`, res.status);
      }
      return {
        bytes,
        finalUrl: res.url || fileUrl,
        origin: {
          contentType: res.headers.get('content-type'),
          contentLength: parseContentLength(res.headers.get('content-length')),
          contentEncoding: res.headers.get('content-encoding'),
        },
      };
    } catch (err) {
      if (err instanceof DownloadError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new DownloadError(`Download of ${fileUrl} timed out after ${this.timeoutMs}ms`);
      }
      throw new DownloadError(`Download of ${fileUrl} failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
