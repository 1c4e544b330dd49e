/**
 * Block Normalizer Tests
 */

import { normalizeBlocks, MIN_BLOCK_LENGTH } from '@dronescan/shared';
import { blocksOf } from './helpers';

describe('normalizeBlocks', () => {
  it('should join trimmed blocks with newlines and with spaces', () => {
    const text = normalizeBlocks(blocksOf(['  Crop Monitoring ', 'Survey date: 14-06-2024']));

    expect(text.structured).toBe('Crop Monitoring\nSurvey date: 14-06-2024');
    expect(text.flat).toBe('Crop Monitoring Survey date: 14-06-2024');
    expect(text.blockCount).toBe(2);
  });

  it('should drop blocks of three characters or fewer', () => {
    const text = normalizeBlocks(blocksOf(['p1', ' 2/3 ', 'Fine', 'ab c']));

    expect(MIN_BLOCK_LENGTH).toBe(3);
    expect(text.structured).toBe('Fine\nab c');
    expect(text.blockCount).toBe(2);
  });

  it('should keep offsets identical across views', () => {
    const text = normalizeBlocks(blocksOf(['Crop: maize', 'Field area: 12 Hectare']));

    expect(text.flat.length).toBe(text.structured.length);
    expect(text.flat.indexOf('Field area:')).toBe(text.structured.indexOf('Field area:'));
  });

  it('should provide lowercase views', () => {
    const text = normalizeBlocks(blocksOf(['Total area PLANT STRESS', '22 ha = 50% field']));

    expect(text.flatLower).toBe('total area plant stress 22 ha = 50% field');
    expect(text.structuredLower).toBe('total area plant stress\n22 ha = 50% field');
  });

  it('should return empty views for a page without text', () => {
    const text = normalizeBlocks([]);

    expect(text.structured).toBe('');
    expect(text.flat).toBe('');
    expect(text.blockCount).toBe(0);
  });
});
