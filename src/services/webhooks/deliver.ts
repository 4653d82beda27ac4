import { config } from '../../config';
import type { CertificateDecision } from '../../types/certificate';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ module: 'callback' });

export const DECISION_EVENT = 'certificate.decision';

/**
 * Single best-effort POST of a finalized decision to the caller's callback
 * URL. Resolves to whether the receiver acknowledged with a 2xx; never throws.
 */
export async function deliverDecision(
  responseUrl: string,
  decision: CertificateDecision,
  timeoutMs: number = config.CALLBACK_TIMEOUT_MS
): Promise<boolean> {
  const body = {
    event: DECISION_EVENT,
    timestamp: new Date().toISOString(),
    ...decision,
  };

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const context = { documentId: decision.documentId, runId: decision.runId, url: responseUrl };
  try {
    const res = await fetch(responseUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    if (!res.ok) {
      log.warn({ ...context, status: res.status }, 'decision callback rejected');
      return false;
    }
    log.info({ ...context, status: res.status }, 'decision callback delivered');
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      log.warn({ ...context, timeoutMs }, 'decision callback timed out');
    } else {
      log.warn({ ...context, err }, 'decision callback failed');
    }
    return false;
  } finally {
    clearTimeout(timeoutId);
  }
}
