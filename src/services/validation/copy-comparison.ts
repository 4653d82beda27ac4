import type { DocumentTypeProfile } from '../../documents/document-registry';
import type { ExtractedFields, FieldDifference } from '../../types/certificate';
import { normalizeForCompare } from './normalization';

/**
 * Field-by-field comparison of the submitted certificate against the official
 * copy retrieved from the registry. Fields absent on both sides are ignored.
 */
export function compareWithOfficialCopy(
  profile: DocumentTypeProfile,
  submitted: ExtractedFields,
  retrieved: ExtractedFields
): FieldDifference[] {
  const differences: FieldDifference[] = [];
  for (const { name } of profile.fields) {
    const submittedValue = submitted[name] ?? null;
    const retrievedValue = retrieved[name] ?? null;
    const a = normalizeForCompare(submittedValue);
    const b = normalizeForCompare(retrievedValue);
    if (a === b) continue;
    differences.push({ field: name, submittedValue, retrievedValue });
  }
  return differences;
}
