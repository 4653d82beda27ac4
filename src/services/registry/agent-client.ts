import { z } from 'zod';
import { config } from '../../config';
import { createChildLogger } from '../../utils/logger';
import type { AgentAnswer, RegistryAgent, RegistrySubmission } from './types';

const log = createChildLogger({ module: 'registry-agent' });

const agentResponseSchema = z.object({
  success: z.boolean(),
  valid: z.boolean().default(false),
  message: z.string().nullish(),
  error: z.string().nullish(),
  pdfBase64: z.string().nullish(),
});

export interface AgentClientOptions {
  baseUrl: string;
  timeoutMs: number;
}

function endpointFor(submission: RegistrySubmission): { path: string; body: Record<string, string> } {
  switch (submission.mode) {
    case 'certificate_code':
      return { path: '/verify/certificate-code', body: { code: submission.certificateCode } };
    case 'folio':
      return {
        path: '/verify/folio',
        body: {
          officeCode: submission.officeCode,
          year: submission.year,
          sequenceNumber: submission.sequenceNumber,
          verificationCode: submission.verificationCode,
        },
      };
  }
}

/**
 * HTTP client for the automation agent. Only a response with success=true is
 * a definitive registry answer; everything else is a technical failure.
 */
export class HttpRegistryAgent implements RegistryAgent {
  constructor(
    private readonly options: AgentClientOptions = {
      baseUrl: config.REGISTRY_AGENT_URL,
      timeoutMs: config.REGISTRY_AGENT_TIMEOUT_MS,
    }
  ) {}

  async submitAndVerify(variant: string, submission: RegistrySubmission): Promise<AgentAnswer> {
    const { path, body } = endpointFor(submission);
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!res.ok) {
        return { kind: 'technical_failure', error: `Agent responded with HTTP ${res.status}` };
      }

      const parsed = agentResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return { kind: 'technical_failure', error: 'Agent returned an unexpected response shape' };
      }
      const data = parsed.data;
      if (!data.success) {
        return { kind: 'technical_failure', error: data.error || data.message || 'Agent could not complete the verification' };
      }

      log.info({ variant, valid: data.valid }, 'registry answered');
      const message =
        data.message || (data.valid ? 'Certificate confirmed by registry' : 'Registry reports the certificate as invalid');
      if (data.valid && data.pdfBase64) {
        return { kind: 'definitive', valid: true, message, officialCopy: Buffer.from(data.pdfBase64, 'base64') };
      }
      return { kind: 'definitive', valid: data.valid, message };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return { kind: 'technical_failure', error: `Agent timed out after ${this.options.timeoutMs}ms` };
      }
      return { kind: 'technical_failure', error: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
