import {
  findIdentityConcept,
  firstPresent,
  type DocumentTypeProfile,
  type IdentityMatchRule,
  type TextMatchRule,
  type ValidationRule,
  type ValueMatchRule,
} from '../documents/document-registry';
import { normalizeDeclaredValue, normalizePlain, normalizeRut } from '../services/validation/normalization';
import { tokenSetRatio } from '../services/validation/text-similarity';
import type { ExtractedFields, IdentityData, ValidationResult } from '../types/certificate';
import type { EvaluationReport, RuleContext, RuleEvaluator, RuleOutcome } from './rule-types';

function extractedValue(ctx: RuleContext, field: string): string | null {
  return firstPresent([field], ctx.extractedFields);
}

function identityValue(ctx: RuleContext, conceptName: string): string | null {
  const concept = findIdentityConcept(ctx.profile, conceptName);
  return concept ? firstPresent(concept.aliases, ctx.identityData) : null;
}

const evaluateIdentityMatch: RuleEvaluator<IdentityMatchRule> = (rule, ctx) => {
  const expected = identityValue(ctx, rule.concept);
  if (expected === null) {
    return { passed: false, message: `Missing identity concept "${rule.concept}" in caller data` };
  }
  const actual = extractedValue(ctx, rule.field);
  if (actual === null) {
    return { passed: false, message: `Field "${rule.field}" was not extracted from the document` };
  }
  const normalize = rule.format === 'rut' ? normalizeRut : normalizePlain;
  if (normalize(actual) === normalize(expected)) {
    return { passed: true, message: `${rule.field} matches (${actual})` };
  }
  return { passed: false, message: `${rule.field} "${actual}" does not match supplied "${expected}"` };
};

const evaluateTextMatch: RuleEvaluator<TextMatchRule> = (rule, ctx) => {
  const expected = identityValue(ctx, rule.concept);
  if (expected === null) {
    return { passed: false, message: `Missing identity concept "${rule.concept}" in caller data` };
  }
  const actual = extractedValue(ctx, rule.field);
  if (actual === null) {
    return { passed: false, message: `Field "${rule.field}" was not extracted from the document` };
  }
  const similarity = tokenSetRatio(actual, expected);
  const passed = similarity >= rule.threshold;
  const score = Math.round(similarity * 1000) / 1000;
  return {
    passed,
    score,
    message: passed
      ? `${rule.field} similarity ${score} meets threshold ${rule.threshold}`
      : `${rule.field} "${actual}" similarity ${score} to "${expected}" is below threshold ${rule.threshold}`,
  };
};

const evaluateValueMatch: RuleEvaluator<ValueMatchRule> = (rule, ctx) => {
  const actual = extractedValue(ctx, rule.field);
  if (actual === null) {
    return { passed: false, message: `Field "${rule.field}" was not extracted from the document` };
  }
  const normalizedActual = normalizeDeclaredValue(actual);
  const normalizedExpected = normalizeDeclaredValue(rule.expected);
  const passed =
    rule.operator === 'contains_case_insensitive'
      ? normalizedActual.includes(normalizedExpected)
      : normalizedActual === normalizedExpected;
  return {
    passed,
    message: passed
      ? `${rule.field} shows "${rule.expected}"`
      : `${rule.field} shows "${actual}", expected "${rule.expected}"`,
  };
};

function evaluateRule(rule: ValidationRule, ctx: RuleContext): RuleOutcome {
  switch (rule.kind) {
    case 'identity_match':
      return evaluateIdentityMatch(rule, ctx);
    case 'text_match':
      return evaluateTextMatch(rule, ctx);
    case 'value_match':
      return evaluateValueMatch(rule, ctx);
  }
}

/**
 * Runs every rule of the profile in declaration order. No short-circuit:
 * each rule yields one result and each failure one cross_validation rejection.
 */
export function evaluate(
  profile: DocumentTypeProfile,
  extractedFields: ExtractedFields,
  identityData: IdentityData
): EvaluationReport {
  const ctx: RuleContext = { profile, extractedFields, identityData };
  const report: EvaluationReport = { validationResults: [], rejections: [] };

  for (const rule of profile.rules) {
    const outcome = evaluateRule(rule, ctx);
    const result: ValidationResult = {
      rule: rule.name,
      description: rule.description,
      kind: rule.kind,
      field: rule.field,
      passed: outcome.passed,
      message: outcome.message,
    };
    if (outcome.score !== undefined) result.score = outcome.score;
    report.validationResults.push(result);

    if (!outcome.passed) {
      report.rejections.push({
        type: 'cross_validation',
        rule: rule.name,
        details: `${rule.description}: ${outcome.message}`,
      });
    }
  }

  return report;
}
