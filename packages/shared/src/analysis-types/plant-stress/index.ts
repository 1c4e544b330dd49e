/**
 * Plant Stress Analysis
 *
 * Table rows: "Fine 31% 14.05", "Potential Plant Stress 10% 2.0", "Plant Stress 69% 22.04".
 * "Plant Stress" rows share a suffix with "Potential Plant Stress" rows, hence the guard.
 */

import type { AnalysisTypeConfig } from '../types';

export const plantStressConfig: AnalysisTypeConfig = {
  key: 'plant_stress',
  label: 'Plant stress analysis',
  keywords: ['PLANT STRESS'],
  totalAreaLabel: 'Total area PLANT STRESS',
  levels: [
    { level: 'Fine', severity: 'healthy', pattern: /Fine\s+([\d.]+)%\s+([\d.]+)/ },
    {
      level: 'Potential Plant Stress',
      severity: 'moderate',
      pattern: /Potential Plant Stress\s+([\d.]+)%\s+([\d.]+)/,
    },
    {
      level: 'Plant Stress',
      severity: 'high',
      pattern: /Plant Stress\s+([\d.]+)%\s+([\d.]+)/,
      excludeIfPreceded: 'Potential',
    },
  ],
  significantSeverities: ['high', 'moderate'],
};
