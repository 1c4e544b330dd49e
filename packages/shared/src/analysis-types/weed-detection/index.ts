/**
 * Weed Detection Analysis
 */

import type { AnalysisTypeConfig } from '../types';

export const weedDetectionConfig: AnalysisTypeConfig = {
  key: 'weed_detection',
  label: 'Weed detection',
  keywords: ['WEED DETECTION', 'WEED STRESS', 'Weed Pressure'],
  totalAreaLabel: 'Total area WEED STRESS',
  levels: [
    { level: 'Fine', severity: 'healthy', pattern: /Fine\s+([\d.]+)%\s+([\d.]+)/ },
    {
      level: 'Low Weed Pressure',
      severity: 'low',
      pattern: /Low Weed Pressure\s+([\d.]+)%\s+([\d.]+)/,
    },
    {
      level: 'Medium Weed Pressure',
      severity: 'moderate',
      pattern: /Medium Weed Pressure\s+([\d.]+)%\s+([\d.]+)/,
    },
    {
      level: 'High Weed Pressure',
      severity: 'high',
      pattern: /High Weed Pressure\s+([\d.]+)%\s+([\d.]+)/,
    },
  ],
};
