/**
 * @fileoverview Zod schemas for the rule corpus document
 *
 * A corpus is `{ version: 1, rules: [...] }`. Rules are validated one at a
 * time so an error can name the offending rule id.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { LANGUAGES, PERSPECTIVES, PLATFORMS, SEVERITIES } from '../types.js';

// ============================================================================
// SCHEMA VERSION
// ============================================================================

export const CORPUS_FORMAT_VERSION = 1;

// ============================================================================
// PATTERNS
// ============================================================================

const NameList = z.array(z.string().min(1));

const scopeConstraintFields = {
  inside: NameList.optional(),
  not_inside: NameList.optional(),
};

export const SequencePatternSchema = z.object({
  sequence: z.string().min(1),
  max_gap: z.number().int().min(0).max(64).optional(),
  ...scopeConstraintFields,
}).strict();

export const RegexPatternSchema = z.object({
  regex: z.string().min(1),
  flags: z.string().regex(/^[ius]*$/, 'flags may only contain i, u and s').optional(),
  ...scopeConstraintFields,
}).strict();

export const ArgumentKindSchema = z.enum(['number', 'string', 'null', 'boolean', 'identifier']);

export const ShapeArgumentSchema = z.object({
  label: z.string().min(1).optional(),
  position: z.number().int().min(0).optional(),
  unlabeled: z.boolean().optional(),
  kind: ArgumentKindSchema,
  units: NameList.optional(),
  below: z.number().optional(),
  above: z.number().optional(),
}).strict().refine(
  (arg) => arg.label !== undefined || arg.position !== undefined,
  { message: 'argument needs a label or a position' },
).refine(
  (arg) => arg.kind === 'number' || (arg.below === undefined && arg.above === undefined && arg.units === undefined),
  { message: 'units, below and above only apply to number arguments' },
);

export const ShapePatternSchema = z.object({
  shape: z.object({
    call: NameList.min(1),
    receiver: NameList.min(1).optional(),
    argument: ShapeArgumentSchema.optional(),
    not_within_calls: NameList.optional(),
    chain_lacks: NameList.optional(),
  }).strict(),
  ...scopeConstraintFields,
}).strict();

export const RulePatternSchema = z.union([SequencePatternSchema, RegexPatternSchema, ShapePatternSchema]);

// ============================================================================
// RULES
// ============================================================================

export const RuleDefinitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'id must be kebab-case'),
  title: z.string().min(1),
  pattern: RulePatternSchema,
  severity: z.enum(SEVERITIES),
  perspectives: z.array(z.enum(PERSPECTIVES)).min(1),
  platforms: z.array(z.enum(PLATFORMS)).default([]),
  languages: z.array(z.enum(LANGUAGES)).default([]),
  accessibility: z.boolean().default(false),
  message: z.string().min(1),
  fix_hint: z.string().default(''),
}).strict();

export const CorpusDocumentSchema = z.object({
  version: z.literal(CORPUS_FORMAT_VERSION),
  rules: z.array(z.unknown()),
}).strict();

export type RuleDefinitionInput = z.input<typeof RuleDefinitionSchema>;

/**
 * Flatten zod issues into `path: message` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '/'}: ${issue.message}`);
}
