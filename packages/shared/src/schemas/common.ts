import { z } from 'zod';
import { DEFAULT_FUZZY_THRESHOLD } from '../constants/entity-suffixes';

// --- Similarity threshold ---
export const thresholdSchema = z
  .number({ invalid_type_error: 'Threshold must be a number' })
  .int('Threshold must be an integer')
  .min(0, 'Threshold must be between 0 and 100')
  .max(100, 'Threshold must be between 0 and 100');

// --- Normalizer policies ---
export const ampersandPolicySchema = z.enum(['spaced', 'always']);
export type AmpersandPolicy = z.infer<typeof ampersandPolicySchema>;

export const hyphenPolicySchema = z.enum(['space', 'preserve']);
export type HyphenPolicy = z.infer<typeof hyphenPolicySchema>;

export const leadingStopwordPolicySchema = z.enum(['capitalize', 'lowercase']);
export type LeadingStopwordPolicy = z.infer<typeof leadingStopwordPolicySchema>;

export const normalizerPolicySchema = z.object({
  ampersand: ampersandPolicySchema.optional(),
  hyphen: hyphenPolicySchema.optional(),
  leadingStopword: leadingStopwordPolicySchema.optional(),
});
export type NormalizerPolicy = z.infer<typeof normalizerPolicySchema>;

// --- Batch options ---
export const cleanOptionsSchema = z.object({
  column: z.string().min(1).optional(),
  fuzzy: z.boolean().default(false),
  threshold: thresholdSchema.default(DEFAULT_FUZZY_THRESHOLD),
  policy: normalizerPolicySchema.optional(),
});
export type CleanOptionsInput = z.input<typeof cleanOptionsSchema>;
export type CleanOptions = z.infer<typeof cleanOptionsSchema>;

