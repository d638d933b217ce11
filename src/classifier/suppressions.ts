/**
 * @fileoverview Suppression directives
 *
 * Directive syntax, inside any comment:
 *
 * ```
 * // ui-audit-allow [rule-id[,rule-id...]] [as=<severity>] [-- justification]
 * ```
 *
 * A trailing comment applies to its own line; a comment on its own line
 * applies to the line after the comment ends.
 *
 * @packageDocumentation
 */

import { isSeverity, type SourceComment, type SourceUnit, type SuppressionDirective } from '../types.js';

export const DIRECTIVE_MARKER = 'ui-audit-allow';

const MARKER_PATTERN = new RegExp(`(?:^|[\\s*/!])${DIRECTIVE_MARKER}(?=\\s|$)`);
const OVERRIDE_PREFIX = 'as=';

/**
 * Parse one comment. Returns null when it carries no directive.
 */
export function parseDirective(comment: SourceComment, file: string): SuppressionDirective | null {
  const found = MARKER_PATTERN.exec(comment.text);
  if (!found) return null;

  let rest = comment.text.slice(found.index + found[0].length);
  let justification = '';
  const separator = rest.indexOf('--');
  if (separator >= 0) {
    justification = rest.slice(separator + 2).replace(/\s+/g, ' ').trim();
    rest = rest.slice(0, separator);
  }

  const ruleIds: string[] = [];
  let override: SuppressionDirective['override'];
  let invalidOverride: string | undefined;

  for (const word of rest.split(/[\s,]+/)) {
    if (word.length === 0 || word === '*') continue;
    if (word.startsWith(OVERRIDE_PREFIX)) {
      const value = word.slice(OVERRIDE_PREFIX.length);
      if (isSeverity(value)) {
        override = value;
      } else {
        invalidOverride = value;
      }
      continue;
    }
    ruleIds.push(word);
  }

  const directive: SuppressionDirective = {
    file,
    line: comment.line,
    targetLine: comment.trailing ? comment.line : comment.endLine + 1,
    ruleIds,
    justification,
  };
  if (override !== undefined) directive.override = override;
  if (invalidOverride !== undefined) directive.invalidOverride = invalidOverride;
  return directive;
}

export function parseSuppressions(unit: SourceUnit): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];
  for (const comment of unit.comments) {
    const directive = parseDirective(comment, unit.path);
    if (directive) directives.push(directive);
  }
  return directives;
}
