import type { DocumentTypeProfile, ValidationRule } from '../documents/document-registry';
import type { ExtractedFields, IdentityData, RejectionReason, ValidationResult } from '../types/certificate';

export interface RuleContext {
  profile: DocumentTypeProfile;
  extractedFields: ExtractedFields;
  identityData: IdentityData;
}

export interface RuleOutcome {
  passed: boolean;
  message: string;
  score?: number;
}

export type RuleEvaluator<R extends ValidationRule> = (rule: R, ctx: RuleContext) => RuleOutcome;

export interface EvaluationReport {
  validationResults: ValidationResult[];
  rejections: RejectionReason[];
}
