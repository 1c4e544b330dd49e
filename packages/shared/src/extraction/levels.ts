/**
 * Level Table Extraction
 *
 * Reads the severity-level rows ("Fine 31% 14.05") declared by the active
 * analysis type bundle out of the flat page text.
 */

import type { LevelEntry } from '../types';
import type { AnalysisTypeConfig, LevelRuleSpec } from '../analysis-types/types';
import { parseNumber } from './cascade';

/** How far back the exclusion guard looks from the start of a match */
export const EXCLUSION_LOOKBEHIND = 20;

/**
 * True when any guard keyword occurs just before the match,
 * e.g. "Potential " in front of a "Plant Stress" row. Case-sensitive, so "No"
 * does not match inside words such as "canola" or "Agronomy".
 */
function isExcluded(flatText: string, matchIndex: number, rule: LevelRuleSpec): boolean {
  if (!rule.excludeIfPreceded) return false;

  const preceding = flatText.slice(Math.max(0, matchIndex - EXCLUSION_LOOKBEHIND), matchIndex);

  return rule.excludeIfPreceded
    .split('|')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0)
    .some((keyword) => preceding.includes(keyword));
}

function globalPattern(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
}

/**
 * Extract level entries for an analysis type.
 *
 * Entries come out in rule order, and in source order within one rule.
 * Identical rows (same level, percentage text and hectares text) are kept once.
 * Zero rows ("Fine 0% 0.00") are kept.
 */
export function extractLevels(flatText: string, config: AnalysisTypeConfig): LevelEntry[] {
  const levels: LevelEntry[] = [];
  const seen = new Set<string>();

  for (const rule of config.levels) {
    for (const match of flatText.matchAll(globalPattern(rule.pattern))) {
      const matchIndex = match.index ?? 0;
      if (isExcluded(flatText, matchIndex, rule)) continue;

      const [, percentText, hectaresText] = match;
      const dedupeKey = `${rule.level}|${percentText}|${hectaresText}`;
      if (seen.has(dedupeKey)) continue;

      const percentage = parseNumber(percentText);
      const areaHectares = parseNumber(hectaresText);
      if (percentage === undefined || areaHectares === undefined) continue;
      if (percentage > 100) continue;

      seen.add(dedupeKey);
      levels.push({
        level: rule.level,
        severity: rule.severity,
        percentage,
        area_hectares: areaHectares,
      });
    }
  }

  return levels;
}
