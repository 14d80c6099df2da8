/**
 * @module placeholders
 * `{{name}}` substitution with positional arguments.
 *
 * Distinct placeholder names are bound to arguments in order of first
 * appearance, so `"{{a}} and {{a}} then {{b}}"` takes two arguments.
 * Placeholders without an argument stay in the output as written.
 */

import type { Argument } from '@lexicon/types';

/** Matches `{{name}}`; no whitespace is allowed inside the braces. */
const PLACEHOLDER_RE = /\{\{(\w*)\}\}/g;

/** Placeholder names of `template`, deduplicated, in order of first appearance. */
export function placeholderNames(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const name = match[1] ?? '';
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Replace placeholders in `template` with `args`.
 * Extra arguments are ignored.
 */
export function substitutePlaceholders(template: string, args: readonly Argument[]): string {
  if (args.length === 0) return template;

  const bound = new Map<string, string>();
  placeholderNames(template).forEach((name, index) => {
    if (index < args.length) {
      bound.set(name, String(args[index]));
    }
  });

  return template.replace(PLACEHOLDER_RE, (token: string, name: string) => bound.get(name) ?? token);
}
