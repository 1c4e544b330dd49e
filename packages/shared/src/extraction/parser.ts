/**
 * Report Text Parser
 *
 * Runs every page-1 rule against one normalized text snapshot. Each rule is
 * isolated: a rule that throws is logged and leaves only its own field unset.
 */

import type { AnalysisSection, FieldSection, ReportType, AnalysisTypeKey } from '../types';
import type { AnalysisTypeConfig } from '../analysis-types/types';
import type { NormalizedText } from './blocks';
import { detectAnalysisType } from './detector';
import {
  extractSurveyDate,
  extractReportType,
  extractAnalysisName,
  extractCrop,
  extractGrowingStage,
  extractFieldArea,
  extractAdditionalInfo,
} from './patterns';
import { extractLevels } from './levels';
import { reconcileTotalArea } from './reconciler';
import { logger } from '../logger';

export interface ParsedReportText {
  report: {
    type: ReportType | null;
    survey_date: string | null;
    analysis_name: string | null;
    analysis_type: AnalysisTypeKey | null;
  };
  field: FieldSection;
  analysis: AnalysisSection;
  additional_info: string | null;
}

function safeRule<T>(rule: string, fallback: T, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    logger.warn('Extraction rule failed, leaving field unset', {
      rule,
      error: error instanceof Error ? error.message : String(error),
    });
    return fallback;
  }
}

/**
 * Parse the structured sections of a report from its page-1 text.
 *
 * @param text - Normalized page-1 text
 * @param bundles - Analysis type bundles to detect against (defaults to the registry)
 */
export function parseReportText(
  text: NormalizedText,
  bundles?: readonly AnalysisTypeConfig[]
): ParsedReportText {
  const detected = safeRule('analysis_type', null, () => detectAnalysisType(text.structured, bundles));

  const levels = detected
    ? safeRule('levels', [], () => extractLevels(text.flat, detected.config))
    : [];

  const totals = detected
    ? safeRule('total_area', { total_area_hectares: null, total_area_percent: null }, () =>
        reconcileTotalArea(text, detected.config, levels)
      )
    : { total_area_hectares: null, total_area_percent: null };

  const parsed: ParsedReportText = {
    report: {
      type: safeRule('report_type', null, () => extractReportType(text)),
      survey_date: safeRule('survey_date', null, () => extractSurveyDate(text)),
      analysis_name: safeRule('analysis_name', null, () => extractAnalysisName(text, detected)),
      analysis_type: detected?.key ?? null,
    },
    field: {
      crop: safeRule('crop', null, () => extractCrop(text)),
      growing_stage: safeRule('growing_stage', null, () => extractGrowingStage(text)),
      area_hectares: safeRule('field_area', null, () => extractFieldArea(text)),
    },
    analysis: {
      total_area_hectares: totals.total_area_hectares,
      total_area_percent: totals.total_area_percent,
      levels,
    },
    additional_info: safeRule('additional_info', null, () => extractAdditionalInfo(text)),
  };

  logger.debug('Parsed report text', {
    analysis_type: parsed.report.analysis_type,
    level_count: levels.length,
    block_count: text.blockCount,
  });

  return parsed;
}
