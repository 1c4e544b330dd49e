/**
 * Pattern Cascades
 *
 * A field rule is an ordered list of (pattern, scope) steps. Steps run in order
 * and the first one whose pattern matches and whose reader accepts the match wins.
 */

import type { NormalizedText } from './blocks';

export type TextView = 'structured' | 'flat' | 'structuredLower' | 'flatLower';

/**
 * Where a step's pattern is evaluated.
 *
 * - `text`: the whole view
 * - `after`: the `chars` characters following the first occurrence of `label`
 * - `before`: the `chars` characters preceding the first occurrence of `label`
 *
 * Labels are lowercased automatically for the lowercase views.
 */
export type CascadeScope =
  | { kind: 'text'; view: TextView }
  | { kind: 'after'; view: TextView; label: string; chars: number }
  | { kind: 'before'; view: TextView; label: string; chars: number };

export interface CascadeStep<T> {
  name: string;
  scope: CascadeScope;
  pattern: RegExp;
  /** Which match inside the scope to read; defaults to the first */
  pick?: 'first' | 'last';
  /** Convert a match to a value; undefined rejects it and the cascade moves on */
  read: (match: RegExpMatchArray) => T | undefined;
}

export interface CascadeHit<T> {
  value: T;
  step: string;
}

/**
 * Cut the slice of text a scope refers to.
 * Returns null when the scope's label does not occur in the view.
 */
export function resolveScope(text: NormalizedText, scope: CascadeScope): string | null {
  const haystack = text[scope.view];
  if (scope.kind === 'text') return haystack;

  const label = scope.view.endsWith('Lower') ? scope.label.toLowerCase() : scope.label;
  const labelIndex = haystack.indexOf(label);
  if (labelIndex === -1) return null;

  if (scope.kind === 'after') {
    const start = labelIndex + label.length;
    return haystack.slice(start, start + scope.chars);
  }

  return haystack.slice(Math.max(0, labelIndex - scope.chars), labelIndex);
}

function findMatch(scoped: string, pattern: RegExp, pick: 'first' | 'last'): RegExpMatchArray | null {
  if (pick === 'first') {
    return scoped.match(new RegExp(pattern.source, pattern.flags.replace('g', '')));
  }
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const matches = Array.from(scoped.matchAll(new RegExp(pattern.source, flags)));
  return matches.length > 0 ? matches[matches.length - 1] : null;
}

/**
 * Run a cascade against normalized text.
 *
 * @returns The first accepted value and the name of the step that produced it
 */
export function runCascade<T>(
  text: NormalizedText,
  steps: readonly CascadeStep<T>[]
): CascadeHit<T> | null {
  for (const step of steps) {
    const scoped = resolveScope(text, step.scope);
    if (scoped === null) continue;

    const match = findMatch(scoped, step.pattern, step.pick ?? 'first');
    if (!match) continue;

    const value = step.read(match);
    if (value !== undefined) {
      return { value, step: step.name };
    }
  }

  return null;
}

/**
 * Parse a `[\d.]+` capture. Malformed runs such as "1.2.3" or "." are rejected;
 * a single trailing period (end of sentence) is tolerated.
 */
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d*\.?\d+\.?$/.test(raw)) return undefined;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}
