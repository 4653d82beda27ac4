import type { DecisionStatus, ExternalVerificationOutcome, RejectionReason, RejectionType } from '../../types/certificate';

const SHORT_CIRCUIT_TYPES: readonly RejectionType[] = ['classification_mismatch', 'extraction_failed'];

export function notAttempted(message = 'External verification not attempted'): ExternalVerificationOutcome {
  return {
    attempted: false,
    success: false,
    valid: false,
    message,
    submittedInputs: null,
    attempts: [],
    retrievedCopyRef: null,
  };
}

/**
 * Final status from the accumulated rejections. A verification step that ran
 * but reached no definitive answer goes to manual review, unless another
 * check already proved the certificate wrong.
 */
export function deriveStatus(rejectionReasons: readonly RejectionReason[], verificationUnresolved: boolean): DecisionStatus {
  if (rejectionReasons.some((r) => SHORT_CIRCUIT_TYPES.includes(r.type))) {
    return 'REJECTED';
  }
  if (rejectionReasons.some((r) => r.type !== 'download_error')) {
    return 'REJECTED';
  }
  if (verificationUnresolved) {
    return 'MANUAL_REVIEW';
  }
  return 'APPROVED';
}
