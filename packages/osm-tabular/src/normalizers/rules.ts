/**
 * Normalization Rule Tables
 *
 * Abbreviation lists and malformed-literal corrections live in
 * `data/normalization-rules.json` and are validated with zod on load. A
 * project can point `rulesPath` in its config at its own file to extend or
 * correct them without touching the normalizer code.
 *
 * @module normalizers/rules
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../core/errors.js';
import { getDataPath } from '../core/utils/paths.js';

// ============================================================================
// Schema
// ============================================================================

const Word = z.string().regex(/^\S+$/, 'must be a single word without whitespace');

/**
 * `[abbreviation, expansion]`, scanned in file order
 */
const StreetAbbreviationSchema = z.tuple([Word, Word]);

const StreetRulesSchema = z
  .object({
    abbreviations: z.array(StreetAbbreviationSchema),
    expectedTypes: z.array(z.string().min(1)),
  })
  .superRefine((rules, ctx) => {
    // An expansion that is also an abbreviation would be rewritten on a second pass
    const abbreviations = new Set(rules.abbreviations.map(([abbreviation]) => abbreviation));
    rules.abbreviations.forEach(([, expansion], index) => {
      if (abbreviations.has(expansion)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['abbreviations', index, 1],
          message: `expansion "${expansion}" is also listed as an abbreviation`,
        });
      }
    });
  });

const PhoneRulesSchema = z.object({
  corrections: z.record(z.string()),
  prefixLabels: z.array(z.string().min(1)),
  strip: z.array(z.string().min(1)),
  maxLength: z.number().int().positive(),
});

const PostcodeRulesSchema = z.object({
  corrections: z.record(z.string()),
  length: z.number().int().positive(),
  padCharacter: z.string().length(1),
});

const PharmacyRulesSchema = z.object({
  remove: z.array(z.string().min(1)),
});

export const NormalizationRulesSchema = z.object({
  version: z.literal(1),
  street: StreetRulesSchema,
  phone: PhoneRulesSchema,
  postcode: PostcodeRulesSchema,
  pharmacy: PharmacyRulesSchema,
});

export type NormalizationRules = z.infer<typeof NormalizationRulesSchema>;
export type StreetRules = NormalizationRules['street'];
export type StreetAbbreviation = z.infer<typeof StreetAbbreviationSchema>;
export type PhoneRules = NormalizationRules['phone'];
export type PostcodeRules = NormalizationRules['postcode'];
export type PharmacyRules = NormalizationRules['pharmacy'];

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate an already-parsed rules object
 */
export function parseNormalizationRules(input: unknown, source = 'inline rules'): NormalizationRules {
  const result = NormalizationRulesSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid normalization rules: ${details}`, source);
  }
  return result.data;
}

/**
 * Read and validate a rules file (JSON or YAML)
 */
export function loadNormalizationRules(filePath: string): NormalizationRules {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read normalization rules: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  let parsed: unknown;
  try {
    // YAML is a superset of JSON
    parsed = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse normalization rules: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  return parseNormalizationRules(parsed, filePath);
}

export const DEFAULT_RULES_PATH = getDataPath('normalization-rules.json');

/**
 * Rules bundled with the package
 */
export const DEFAULT_RULES: NormalizationRules = loadNormalizationRules(DEFAULT_RULES_PATH);
