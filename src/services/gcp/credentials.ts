import { z } from 'zod';

const serviceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
});

export type GcpCredentials = z.infer<typeof serviceAccountSchema>;

/** Service-account key from GCP_SERVICE_ACCOUNT_JSON; falls back to application default credentials when unset. */
export function getGcpCredentials(): GcpCredentials | undefined {
  const json = process.env.GCP_SERVICE_ACCOUNT_JSON;
  if (!json) return undefined;
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new Error('GCP_SERVICE_ACCOUNT_JSON is not valid JSON');
  }
  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error('GCP_SERVICE_ACCOUNT_JSON is missing client_email or private_key');
  }
  return parsed.data;
}
