/**
 * Analysis Type Configuration Types
 *
 * Each analysis type (plant stress, flowering, weed detection) is described by
 * an immutable rule bundle. Extraction control flow never branches on the type
 * itself: it only reads the bundle that detection selected.
 */

import type { AnalysisTypeKey, Severity } from '../types';

/**
 * One row of the level table.
 *
 * The pattern must capture the percentage as group 1 and the hectares as group 2.
 * It is always run as a global scan, so it must not carry the `g` flag itself.
 */
export interface LevelRuleSpec {
  readonly level: string;
  readonly severity: Severity;
  readonly pattern: RegExp;
  /**
   * Pipe-delimited keywords ("Full|No"). A match is discarded when any of them
   * appears in the characters immediately preceding it.
   */
  readonly excludeIfPreceded?: string;
}

export interface AnalysisTypeConfig {
  readonly key: AnalysisTypeKey;
  /** Human-readable description of the analysis */
  readonly label: string;
  /** Case-insensitive substrings that identify the analysis type */
  readonly keywords: readonly string[];
  /** Label preceding the "<num> ha = <num>% field" total, e.g. "Total area PLANT STRESS" */
  readonly totalAreaLabel: string;
  /** Evaluated in order; entries are emitted in this order */
  readonly levels: readonly LevelRuleSpec[];
  /**
   * Severities that count toward the derived total area.
   * Defaults to every severity except healthy and low.
   */
  readonly significantSeverities?: readonly Severity[];
}

/**
 * Result of analysis type detection
 */
export interface DetectedAnalysisType {
  key: AnalysisTypeKey;
  config: AnalysisTypeConfig;
  /** The bundle keyword that matched, as declared in the bundle */
  matchedKeyword: string;
}
