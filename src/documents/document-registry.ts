/**
 * Document type registry: one declarative profile per certificate variant.
 * Profiles are loaded from document-profiles.json, validated once at module
 * load and shared read-only by every job. Supporting a new certificate kind
 * means adding a profile entry there; the pipeline has no per-variant branches.
 */
import { z } from 'zod';
import rawProfiles from './document-profiles.json';
import { UnknownVariantError } from '../errors';
import { deepFreeze } from '../utils/freeze';

const fieldDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['tax_id', 'text', 'code', 'date']),
  description: z.string(),
});

const identityConceptSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).min(1),
  required: z.boolean(),
});

const ruleBase = {
  name: z.string().min(1),
  description: z.string(),
  field: z.string().min(1),
};

const validationRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('identity_match'),
    ...ruleBase,
    concept: z.string().min(1),
    format: z.enum(['rut', 'plain']).default('plain'),
  }),
  z.object({
    kind: z.literal('text_match'),
    ...ruleBase,
    concept: z.string().min(1),
    threshold: z.number().min(0).max(1),
  }),
  z.object({
    kind: z.literal('value_match'),
    ...ruleBase,
    expected: z.string().min(1),
    operator: z.enum(['equals_case_insensitive', 'contains_case_insensitive']),
  }),
]);

const submissionSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('certificate_code'),
    fields: z.object({ certificateCode: z.string().min(1) }),
  }),
  z.object({
    mode: z.literal('folio'),
    fields: z.object({
      officeCode: z.string().min(1),
      year: z.string().min(1),
      sequenceNumber: z.string().min(1),
      verificationCode: z.string().min(1),
    }),
  }),
]);

const profileSchema = z
  .object({
    variant: z.string().min(1),
    displayName: z.string(),
    classificationHint: z.string(),
    fields: z.array(fieldDefinitionSchema).min(1),
    requiredFields: z.array(z.string()),
    identityConcepts: z.array(identityConceptSchema),
    rules: z.array(validationRuleSchema),
    submission: submissionSchema,
  })
  .superRefine((profile, ctx) => {
    const fieldNames = new Set(profile.fields.map((f) => f.name));
    const conceptNames = new Set(profile.identityConcepts.map((c) => c.name));
    const referencedFields = [
      ...profile.requiredFields,
      ...profile.rules.map((r) => r.field),
      ...Object.values(profile.submission.fields),
    ];
    for (const name of referencedFields) {
      if (!fieldNames.has(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${profile.variant}: unknown field "${name}"` });
      }
    }
    for (const rule of profile.rules) {
      if (rule.kind !== 'value_match' && !conceptNames.has(rule.concept)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${profile.variant}: rule "${rule.name}" references unknown concept "${rule.concept}"`,
        });
      }
    }
  });

const registrySchema = z.object({ profiles: z.array(profileSchema).min(1) });

export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>;
export type IdentityConcept = z.infer<typeof identityConceptSchema>;
export type ValidationRule = z.infer<typeof validationRuleSchema>;
export type IdentityMatchRule = Extract<ValidationRule, { kind: 'identity_match' }>;
export type TextMatchRule = Extract<ValidationRule, { kind: 'text_match' }>;
export type ValueMatchRule = Extract<ValidationRule, { kind: 'value_match' }>;
export type SubmissionSpec = z.infer<typeof submissionSchema>;
export type DocumentTypeProfile = z.infer<typeof profileSchema>;

export function loadProfiles(source: unknown): Map<string, DocumentTypeProfile> {
  const { profiles } = registrySchema.parse(source);
  const map = new Map<string, DocumentTypeProfile>();
  for (const profile of profiles) {
    if (map.has(profile.variant)) {
      throw new Error(`Duplicate document profile for variant "${profile.variant}"`);
    }
    map.set(profile.variant, deepFreeze(profile));
  }
  return map;
}

const PROFILES = loadProfiles(rawProfiles);

export function profileFor(variant: string): DocumentTypeProfile {
  const profile = PROFILES.get(variant);
  if (!profile) {
    throw new UnknownVariantError(variant);
  }
  return profile;
}

export function registeredVariants(): string[] {
  return [...PROFILES.keys()];
}

export function findIdentityConcept(profile: DocumentTypeProfile, name: string): IdentityConcept | undefined {
  return profile.identityConcepts.find((c) => c.name === name);
}

/**
 * First present, non-empty value among the aliases, probed in order.
 */
export function firstPresent(aliases: readonly string[], data: Readonly<Record<string, string | null | undefined>>): string | null {
  for (const alias of aliases) {
    const value = data[alias];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return null;
}

export function missingRequiredConcepts(profile: DocumentTypeProfile, identityData: Record<string, string>): string[] {
  return profile.identityConcepts
    .filter((concept) => concept.required && firstPresent(concept.aliases, identityData) === null)
    .map((concept) => concept.name);
}
