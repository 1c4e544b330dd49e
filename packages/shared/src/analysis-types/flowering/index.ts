/**
 * Flowering Analysis
 *
 * "Flowering" rows must not be confused with "Full Flowering" or "No Flowering" rows.
 */

import type { AnalysisTypeConfig } from '../types';

export const floweringConfig: AnalysisTypeConfig = {
  key: 'flowering',
  label: 'Flowering analysis',
  keywords: ['FLOWERING'],
  totalAreaLabel: 'Total area FLOWERING',
  levels: [
    { level: 'No Flowering', severity: 'healthy', pattern: /No Flowering\s+([\d.]+)%\s+([\d.]+)/ },
    {
      level: 'Flowering',
      severity: 'moderate',
      pattern: /Flowering\s+([\d.]+)%\s+([\d.]+)/,
      excludeIfPreceded: 'Full|No',
    },
    { level: 'Full Flowering', severity: 'high', pattern: /Full Flowering\s+([\d.]+)%\s+([\d.]+)/ },
  ],
  significantSeverities: ['high', 'moderate'],
};
