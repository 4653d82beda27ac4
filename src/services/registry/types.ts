export type RegistrySubmission =
  | { mode: 'certificate_code'; certificateCode: string }
  | {
      mode: 'folio';
      officeCode: string;
      year: string;
      sequenceNumber: string;
      verificationCode: string;
    };

export type AgentAnswer =
  | { kind: 'technical_failure'; error: string }
  | { kind: 'definitive'; valid: boolean; message: string; officialCopy?: Buffer };

/** Browser-automation agent that drives the registry's web portal. */
export interface RegistryAgent {
  submitAndVerify(variant: string, submission: RegistrySubmission): Promise<AgentAnswer>;
}

/** Keeps official copies retrieved from the registry; returns an opaque reference. */
export interface CopyStore {
  save(documentId: string, bytes: Buffer): Promise<string>;
  load(ref: string): Promise<Buffer>;
}
