/**
 * Total-Area Reconciliation
 *
 * Fills the analysis totals from the "<num> ha = <num>% field" line that sits
 * near the bundle's total-area label. Block reordering can move the line away
 * from its label, so the search widens step by step, and as a last resort the
 * hectares are summed from the significant level rows.
 */

import type { LevelEntry, Severity } from '../types';
import type { AnalysisTypeConfig } from '../analysis-types/types';
import type { NormalizedText } from './blocks';
import { runCascade, parseNumber, type CascadeStep } from './cascade';

export interface TotalArea {
  total_area_hectares: number | null;
  total_area_percent: number | null;
}

type TotalAreaHit = { hectares: number | null; percent: number };

export const HECTARES_AND_PERCENT_PATTERN = /([\d.]+)\s*ha\s*=\s*([\d.]+)%\s*field/;
export const PERCENT_ONLY_PATTERN = /([\d.]+)%\s*field/;

const AFTER_LABEL_WINDOW = 200;
const BEFORE_LABEL_WINDOW = 100;

/** Severities that never count toward a derived total */
const INSIGNIFICANT_SEVERITIES: readonly Severity[] = ['healthy', 'low'];

function readPercent(raw: string | undefined): number | undefined {
  const percent = parseNumber(raw);
  if (percent === undefined || percent > 100) return undefined;
  return percent;
}

function readBoth(m: RegExpMatchArray): TotalAreaHit | undefined {
  const hectares = parseNumber(m[1]);
  const percent = readPercent(m[2]);
  if (hectares === undefined || percent === undefined) return undefined;
  return { hectares, percent };
}

function readPercentOnly(m: RegExpMatchArray): TotalAreaHit | undefined {
  const percent = readPercent(m[1]);
  return percent === undefined ? undefined : { hectares: null, percent };
}

/**
 * Build the total-area cascade for a bundle's label
 */
export function totalAreaCascade(totalAreaLabel: string): CascadeStep<TotalAreaHit>[] {
  const after = { kind: 'after', view: 'flatLower', label: totalAreaLabel, chars: AFTER_LABEL_WINDOW } as const;
  const before = { kind: 'before', view: 'flatLower', label: totalAreaLabel, chars: BEFORE_LABEL_WINDOW } as const;
  const whole = { kind: 'text', view: 'flatLower' } as const;

  return [
    { name: 'after-label', scope: after, pattern: HECTARES_AND_PERCENT_PATTERN, read: readBoth },
    { name: 'after-label-percent', scope: after, pattern: PERCENT_ONLY_PATTERN, read: readPercentOnly },
    // The percentage block can precede its own label; take the nearest one
    {
      name: 'before-label-percent',
      scope: before,
      pattern: PERCENT_ONLY_PATTERN,
      pick: 'last',
      read: readPercentOnly,
    },
    { name: 'document', scope: whole, pattern: HECTARES_AND_PERCENT_PATTERN, read: readBoth },
    { name: 'document-percent', scope: whole, pattern: PERCENT_ONLY_PATTERN, read: readPercentOnly },
  ];
}

/**
 * Sum the hectares of the significant levels, rounded to 2 decimals.
 * Returns null when nothing significant covers any area.
 */
export function deriveTotalHectares(
  levels: readonly LevelEntry[],
  significantSeverities?: readonly Severity[]
): number | null {
  const isSignificant = (severity: Severity) =>
    significantSeverities
      ? significantSeverities.includes(severity)
      : !INSIGNIFICANT_SEVERITIES.includes(severity);

  const sum = levels
    .filter((entry) => isSignificant(entry.severity))
    .reduce((total, entry) => total + entry.area_hectares, 0);

  return sum > 0 ? Math.round(sum * 100) / 100 : null;
}

/**
 * Reconcile total stressed/flowering area for the detected analysis type.
 */
export function reconcileTotalArea(
  text: NormalizedText,
  config: AnalysisTypeConfig,
  levels: readonly LevelEntry[]
): TotalArea {
  const hit = runCascade(text, totalAreaCascade(config.totalAreaLabel));

  const totals: TotalArea = {
    total_area_hectares: hit?.value.hectares ?? null,
    total_area_percent: hit?.value.percent ?? null,
  };

  if (totals.total_area_hectares === null && levels.length > 0) {
    totals.total_area_hectares = deriveTotalHectares(levels, config.significantSeverities);
  }

  return totals;
}
