/**
 * Analysis Type Detection
 *
 * Picks the rule bundle for a report from keyword hits in its page-1 text.
 */

import type { AnalysisTypeConfig, DetectedAnalysisType } from '../analysis-types/types';
import { getAllAnalysisTypes } from '../analysis-types';
import { logger } from '../logger';

/**
 * Detect the analysis type of a report.
 *
 * Bundles are tried in registry order and keywords in declaration order;
 * the first case-insensitive substring hit wins. A report that matches no
 * bundle yields null, and the type-dependent rules then do nothing.
 *
 * @param structuredText - Newline-joined page text
 * @param bundles - Bundles to consider (defaults to the registry)
 */
export function detectAnalysisType(
  structuredText: string,
  bundles: readonly AnalysisTypeConfig[] = getAllAnalysisTypes()
): DetectedAnalysisType | null {
  const haystack = structuredText.toLowerCase();

  for (const config of bundles) {
    const matchedKeyword = config.keywords.find((keyword) =>
      haystack.includes(keyword.toLowerCase())
    );
    if (matchedKeyword !== undefined) {
      logger.debug('Analysis type detected', {
        analysis_type: config.key,
        matched_keyword: matchedKeyword,
      });
      return { key: config.key, config, matchedKeyword };
    }
  }

  logger.debug('No analysis type detected', {
    candidates: bundles.map((config) => config.key),
  });
  return null;
}
