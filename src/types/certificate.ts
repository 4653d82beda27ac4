export type ExtractedFields = Record<string, string | null>;
export type IdentityData = Record<string, string>;

export type JobState = 'PENDING' | 'OCR' | 'VALIDATION' | 'COMPLETED' | 'FAILED';
export type TerminalJobState = Extract<JobState, 'COMPLETED' | 'FAILED'>;
export const ACTIVE_JOB_STATES: readonly JobState[] = ['PENDING', 'OCR', 'VALIDATION'];

export type DecisionStatus = 'APPROVED' | 'REJECTED' | 'MANUAL_REVIEW' | 'ERROR';

export interface ProcessingJob {
  runId: string;
  documentId: string;
  variant: string;
  identityData: IdentityData;
  fileUrl: string;
  responseUrl: string | null;
  origin: string | null;
  destination: string | null;
  state: JobState;
  createdAt: Date;
}

export type RejectionType =
  | 'classification_mismatch'
  | 'extraction_failed'
  | 'cross_validation'
  | 'authenticity_failed'
  | 'invalid_certificate'
  | 'download_error'
  | 'data_mismatch';

export interface FieldDifference {
  field: string;
  submittedValue: string | null;
  retrievedValue: string | null;
}

export interface RejectionReason {
  type: RejectionType;
  rule?: string;
  details: string;
  differences?: FieldDifference[];
}

export interface ValidationResult {
  rule: string;
  description: string;
  kind: 'identity_match' | 'text_match' | 'value_match';
  field: string;
  passed: boolean;
  message: string;
  score?: number;
}

export type AuthenticityVerdict = 'PASSED' | 'WARNING' | 'FAILED';

export interface AuthenticityResult {
  verdict: AuthenticityVerdict;
  signals: string[];
}

export interface VerificationAttempt {
  attempt: number;
  submittedInputs: Record<string, string>;
  outcome: 'technical_failure' | 'valid' | 'invalid';
  message: string;
}

export interface ExternalVerificationOutcome {
  attempted: boolean;
  success: boolean;
  valid: boolean;
  message: string;
  submittedInputs: Record<string, string> | null;
  attempts: VerificationAttempt[];
  retrievedCopyRef: string | null;
}

export interface CertificateDecision {
  documentId: string;
  runId: string;
  variant: string;
  status: DecisionStatus;
  extractedData: ExtractedFields | null;
  validationResults: ValidationResult[];
  rejectionReasons: RejectionReason[];
  authenticityResult: AuthenticityResult | null;
  externalVerification: ExternalVerificationOutcome;
  processingLog: string[];
  processedAt: string;
}
