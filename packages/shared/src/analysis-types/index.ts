/**
 * Analysis Types Module
 *
 * Rule bundles for each supported analysis type. New report types are added by
 * registering another bundle here; extraction code does not change.
 */

export type { AnalysisTypeConfig, LevelRuleSpec, DetectedAnalysisType } from './types';

export {
  registerAnalysisType,
  getAnalysisType,
  getAnalysisTypeOrThrow,
  getAllAnalysisTypes,
  getRegisteredAnalysisTypes,
} from './registry';

export { plantStressConfig } from './plant-stress';
export { floweringConfig } from './flowering';
export { weedDetectionConfig } from './weed-detection';

import { registerAnalysisType } from './registry';
import { plantStressConfig } from './plant-stress';
import { floweringConfig } from './flowering';
import { weedDetectionConfig } from './weed-detection';

/**
 * Register all built-in bundles in detection order.
 */
export function registerAllAnalysisTypes(): void {
  registerAnalysisType(plantStressConfig);
  registerAnalysisType(floweringConfig);
  registerAnalysisType(weedDetectionConfig);
}

// Auto-register all bundles on module load
registerAllAnalysisTypes();
