/**
 * Total-Area Reconciliation Tests
 */

import {
  normalizeBlocks,
  reconcileTotalArea,
  deriveTotalHectares,
  runCascade,
  totalAreaCascade,
  extractLevels,
  plantStressConfig,
  weedDetectionConfig,
  type LevelEntry,
} from '@dronescan/shared';
import { blocksOf, PLANT_STRESS_PAGE, WEED_DETECTION_PAGE } from './helpers';

function reconcile(lines: string[], config = plantStressConfig) {
  const text = normalizeBlocks(blocksOf(lines));
  return reconcileTotalArea(text, config, extractLevels(text.flat, config));
}

describe('reconcileTotalArea', () => {
  it('should read hectares and percent after the label', () => {
    const text = normalizeBlocks(PLANT_STRESS_PAGE);
    const levels = extractLevels(text.flat, plantStressConfig);

    expect(reconcileTotalArea(text, plantStressConfig, levels)).toEqual({
      total_area_hectares: 22.04,
      total_area_percent: 69,
    });
  });

  it('should read the percent alone and derive hectares from the levels', () => {
    const totals = reconcile([
      'Total area PLANT STRESS',
      '69% field',
      'Potential Plant Stress 10% 2.5',
      'Plant Stress 59% 20.25',
    ]);

    expect(totals).toEqual({ total_area_hectares: 22.75, total_area_percent: 69 });
  });

  it('should take the nearest percent before the label', () => {
    const lines = [
      'PLANT STRESS',
      '12% field',
      '22.04 ha',
      '69% field',
      'Total area PLANT STRESS',
      'Fine 31% 14.05',
      'Plant Stress 69% 22.04',
    ];
    const text = normalizeBlocks(blocksOf(lines));

    expect(runCascade(text, totalAreaCascade(plantStressConfig.totalAreaLabel))?.step).toBe(
      'before-label-percent'
    );
    expect(reconcile(lines)).toEqual({ total_area_hectares: 22.04, total_area_percent: 69 });
  });

  it('should search the whole text when the label is missing', () => {
    const totals = reconcile(['PLANT STRESS', 'Stressed: 3.5 ha = 7% field']);

    expect(totals).toEqual({ total_area_hectares: 3.5, total_area_percent: 7 });
  });

  it('should sum the default significant severities when no total is printed', () => {
    const text = normalizeBlocks(WEED_DETECTION_PAGE);
    const levels = extractLevels(text.flat, weedDetectionConfig);

    expect(reconcileTotalArea(text, weedDetectionConfig, levels)).toEqual({
      total_area_hectares: 6.75,
      total_area_percent: null,
    });
  });

  it('should treat percentages above 100 as no match', () => {
    const totals = reconcile(['Total area PLANT STRESS: 5 ha = 150% field']);

    expect(totals).toEqual({ total_area_hectares: null, total_area_percent: null });
  });

  it('should leave totals unset without a printed total or levels', () => {
    expect(reconcile(['PLANT STRESS'])).toEqual({
      total_area_hectares: null,
      total_area_percent: null,
    });
  });
});

describe('deriveTotalHectares', () => {
  const levels: LevelEntry[] = [
    { level: 'Fine', severity: 'healthy', percentage: 50, area_hectares: 10 },
    { level: 'Low', severity: 'low', percentage: 20, area_hectares: 4 },
    { level: 'Medium', severity: 'moderate', percentage: 20, area_hectares: 4.111 },
    { level: 'High', severity: 'high', percentage: 10, area_hectares: 2.002 },
  ];

  it('should exclude healthy and low levels by default and round to 2 decimals', () => {
    expect(deriveTotalHectares(levels)).toBe(6.11);
  });

  it('should honour explicit significant severities', () => {
    expect(deriveTotalHectares(levels, ['high'])).toBe(2);
  });

  it('should return null when the sum is zero', () => {
    expect(deriveTotalHectares(levels.slice(0, 2))).toBeNull();
  });
});
