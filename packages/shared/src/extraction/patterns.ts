/**
 * Report Field Patterns
 *
 * Pattern cascades for the labelled fields on page 1 of a drone analysis report.
 *
 * Page 1 layout (block order is not guaranteed):
 * "Crop Monitoring"
 * "Survey date: 14-06-2024"
 * "Analysis name: Plant stress June"
 * "Crop: sugar beet"  "Growing stage: BBCH69"  "Field area: 45.30 Hectare"
 * "Total area PLANT STRESS: 22.04 ha = 69% field"
 * "Fine 31% 14.05"  "Plant Stress 69% 22.04"
 * "Additional Information (or recommendation): ..."  "Powered by ..."
 */

import type { ReportType } from '../types';
import type { DetectedAnalysisType } from '../analysis-types/types';
import type { NormalizedText } from './blocks';
import { runCascade, parseNumber, type CascadeStep } from './cascade';

// ============================================================================
// Survey date
// ============================================================================

export const SURVEY_DATE_CASCADE: readonly CascadeStep<string>[] = [
  {
    name: 'labelled',
    scope: { kind: 'text', view: 'structured' },
    pattern: /Survey date:\s*(\d{2}-\d{2}-\d{4})/,
    read: (m) => m[1],
  },
  {
    // Any date on the page; an unrelated date can be picked up here
    name: 'bare-date',
    scope: { kind: 'text', view: 'flat' },
    pattern: /(\d{2}-\d{2}-\d{4})/,
    read: (m) => m[1],
  },
];

/**
 * Extract the survey date as DD-MM-YYYY
 */
export function extractSurveyDate(text: NormalizedText): string | null {
  return runCascade(text, SURVEY_DATE_CASCADE)?.value ?? null;
}

// ============================================================================
// Report type
// ============================================================================

/**
 * Checked independently in this order; when both occur the later one wins.
 */
export const REPORT_TYPE_PHRASES: readonly ReportType[] = ['Crop Monitoring', 'Plant Health Monitoring'];

export function extractReportType(text: NormalizedText): ReportType | null {
  let reportType: ReportType | null = null;
  for (const phrase of REPORT_TYPE_PHRASES) {
    if (text.structured.includes(phrase)) {
      reportType = phrase;
    }
  }
  return reportType;
}

// ============================================================================
// Analysis name
// ============================================================================

/** Labels that end a free-text value in the flat view */
const KNOWN_LABELS = [
  'Analysis name:',
  'Survey date:',
  'Crop:',
  'Growing stage:',
  'Field area:',
  'Total area',
  'Additional Information',
  'Powered',
];

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const KNOWN_LABEL_ALTERNATION = KNOWN_LABELS.map(escapeRegExp).join('|');

export const ANALYSIS_NAME_PATTERN = new RegExp(
  `Analysis name:\\s*(?!${KNOWN_LABEL_ALTERNATION})(.+?)(?=\\s*(?:${KNOWN_LABEL_ALTERNATION})|$)`
);

export const ANALYSIS_NAME_MAX_LENGTH = 50;

/** Table header that gets captured when the value block is missing */
const ANALYSIS_NAME_SENTINEL = 'STRESS LEVEL';

export const ANALYSIS_NAME_CASCADE: readonly CascadeStep<string>[] = [
  {
    name: 'labelled',
    scope: { kind: 'text', view: 'flat' },
    pattern: ANALYSIS_NAME_PATTERN,
    read: (m) => {
      const value = m[1].trim();
      if (value.length === 0 || value.length >= ANALYSIS_NAME_MAX_LENGTH) return undefined;
      if (value.toUpperCase().includes(ANALYSIS_NAME_SENTINEL)) return undefined;
      return value;
    },
  },
];

/**
 * Extract the analysis name, falling back to the keyword that identified the
 * analysis type when the report has no usable "Analysis name:" value.
 */
export function extractAnalysisName(
  text: NormalizedText,
  detected: DetectedAnalysisType | null
): string | null {
  const hit = runCascade(text, ANALYSIS_NAME_CASCADE);
  if (hit) return hit.value;
  return detected?.matchedKeyword ?? null;
}

// ============================================================================
// Crop
// ============================================================================

/** Multi-word crop names; single words are caught by the generic steps */
export const KNOWN_CROPS = [
  'sugar beet',
  'winter wheat',
  'spring wheat',
  'durum wheat',
  'winter barley',
  'spring barley',
  'winter rye',
  'oilseed rape',
  'winter rape',
  'grain maize',
  'silage maize',
  'sweet corn',
  'sweet potato',
];

/** Layout label words that follow "Crop:" when its value block is elsewhere */
export const CROP_STOP_WORDS = new Set([
  'total',
  'area',
  'stress',
  'field',
  'growing',
  'stage',
  'analysis',
  'name',
  'plant',
  'health',
  'monitoring',
  'flowering',
]);

const CROP_WINDOW = 200;

function acceptCrop(raw: string): string | undefined {
  const candidate = raw.toLowerCase().replace(/\s+/g, ' ').trim();
  if (candidate.split(' ').some((word) => CROP_STOP_WORDS.has(word))) return undefined;
  return candidate;
}

export const CROP_CASCADE: readonly CascadeStep<string>[] = [
  {
    name: 'known-crop',
    scope: { kind: 'after', view: 'flat', label: 'Crop:', chars: CROP_WINDOW },
    pattern: new RegExp(
      `\\b(${KNOWN_CROPS.map((crop) => crop.split(' ').map(escapeRegExp).join('\\s+')).join('|')})\\b`,
      'i'
    ),
    read: (m) => acceptCrop(m[1]),
  },
  {
    name: 'two-words',
    scope: { kind: 'after', view: 'flat', label: 'Crop:', chars: CROP_WINDOW },
    pattern: /^\s*([a-z]+ [a-z]+)\b/,
    read: (m) => acceptCrop(m[1]),
  },
  {
    name: 'single-word',
    scope: { kind: 'after', view: 'flat', label: 'Crop:', chars: CROP_WINDOW },
    pattern: /^\s*([A-Za-z]{4,})\b/,
    read: (m) => acceptCrop(m[1]),
  },
];

/**
 * Extract the crop name (lowercase)
 */
export function extractCrop(text: NormalizedText): string | null {
  return runCascade(text, CROP_CASCADE)?.value ?? null;
}

// ============================================================================
// Growing stage
// ============================================================================

export const BBCH_PATTERN = /BBCH\s?(\d+)/;

export const GROWING_STAGE_CASCADE: readonly CascadeStep<string>[] = [
  {
    name: 'labelled',
    scope: { kind: 'after', view: 'flat', label: 'Growing stage:', chars: 100 },
    pattern: BBCH_PATTERN,
    read: (m) => `BBCH${m[1]}`,
  },
  {
    name: 'anywhere',
    scope: { kind: 'text', view: 'flat' },
    pattern: BBCH_PATTERN,
    read: (m) => `BBCH${m[1]}`,
  },
];

/**
 * Extract the BBCH growth stage code, e.g. "BBCH69"
 */
export function extractGrowingStage(text: NormalizedText): string | null {
  return runCascade(text, GROWING_STAGE_CASCADE)?.value ?? null;
}

// ============================================================================
// Field area
// ============================================================================

export const HECTARE_PATTERN = /([\d.]+)\s*Hectare/;

export const FIELD_AREA_CASCADE: readonly CascadeStep<number>[] = [
  {
    name: 'labelled',
    scope: { kind: 'after', view: 'flat', label: 'Field area:', chars: 100 },
    pattern: HECTARE_PATTERN,
    read: (m) => parseNumber(m[1]),
  },
  {
    name: 'anywhere',
    scope: { kind: 'text', view: 'flat' },
    pattern: HECTARE_PATTERN,
    read: (m) => parseNumber(m[1]),
  },
];

/**
 * Extract the field area in hectares
 */
export function extractFieldArea(text: NormalizedText): number | null {
  return runCascade(text, FIELD_AREA_CASCADE)?.value ?? null;
}

// ============================================================================
// Additional information
// ============================================================================

export const TEST_COMMENT = 'Test comment';

export const ADDITIONAL_INFO_MAX_LENGTH = 200;

export const ADDITIONAL_INFO_CASCADE: readonly CascadeStep<string>[] = [
  {
    name: 'test-comment',
    scope: { kind: 'text', view: 'structured' },
    pattern: new RegExp(escapeRegExp(TEST_COMMENT)),
    read: () => TEST_COMMENT,
  },
  {
    // Runs to the "Powered by" footer; without it the capture would swallow the page
    name: 'labelled',
    scope: { kind: 'text', view: 'flat' },
    pattern: /Additional Information \(or recommendation\):\s*([\s\S]*?)(?=Powered|$)/,
    read: (m) => {
      const comment = m[1].trim();
      if (comment.length === 0 || comment.length >= ADDITIONAL_INFO_MAX_LENGTH) return undefined;
      return comment;
    },
  },
];

/**
 * Extract the free-text comment block
 */
export function extractAdditionalInfo(text: NormalizedText): string | null {
  return runCascade(text, ADDITIONAL_INFO_CASCADE)?.value ?? null;
}
