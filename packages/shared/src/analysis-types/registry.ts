/**
 * Analysis Type Registry
 *
 * Registry pattern for analysis type rule bundles.
 * Iteration order is registration order, which is also detection priority.
 */

import type { AnalysisTypeKey } from '../types';
import type { AnalysisTypeConfig } from './types';
import { logger } from '../logger';
import { deepFreeze } from '../freeze';

/**
 * Map of analysis type keys to their rule bundles
 */
const analysisTypeRegistry = new Map<AnalysisTypeKey, AnalysisTypeConfig>();

/**
 * Register a rule bundle for an analysis type.
 * Overwrites any existing bundle for that key, keeping its position.
 *
 * @param config - The bundle to register (frozen on registration)
 */
export function registerAnalysisType(config: AnalysisTypeConfig): void {
  analysisTypeRegistry.set(config.key, deepFreeze(config));

  logger.debug('Registered analysis type', {
    analysis_type: config.key,
    keywords: config.keywords,
    level_count: config.levels.length,
  });
}

/**
 * Get the bundle for an analysis type.
 *
 * @returns The bundle for that key, or undefined if not registered
 */
export function getAnalysisType(key: AnalysisTypeKey): AnalysisTypeConfig | undefined {
  return analysisTypeRegistry.get(key);
}

/**
 * Get the bundle for an analysis type, throwing if not found.
 *
 * @throws Error if no bundle is registered for that key
 */
export function getAnalysisTypeOrThrow(key: AnalysisTypeKey): AnalysisTypeConfig {
  const config = analysisTypeRegistry.get(key);
  if (!config) {
    throw new Error(`No analysis type registered for key: ${key}`);
  }
  return config;
}

/**
 * Get all registered bundles, in detection order.
 */
export function getAllAnalysisTypes(): AnalysisTypeConfig[] {
  return Array.from(analysisTypeRegistry.values());
}

/**
 * Get all registered keys, in detection order.
 */
export function getRegisteredAnalysisTypes(): AnalysisTypeKey[] {
  return Array.from(analysisTypeRegistry.keys());
}
