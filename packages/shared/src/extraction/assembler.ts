/**
 * Report Assembly
 */

import type { MapImageResult, ReportMetadata, ReportRecord } from '../types';
import type { ParsedReportText } from './parser';
import { deepFreeze } from '../freeze';

export const PROVIDER_NAME = 'Agremo';

/**
 * Algorithm version for tracking
 */
export const EXTRACTOR_VERSION = '2.1.0';

export interface ReportParts {
  sourceFile: string;
  totalPages: number;
  parsed: ParsedReportText;
  mapImage: MapImageResult;
  extractedAt?: Date;
}

/**
 * Compose the record handed back to callers. The result is frozen and holds
 * plain data only, so it survives a JSON round trip unchanged.
 */
export function assembleReportRecord(parts: ReportParts): ReportRecord {
  const metadata: ReportMetadata = {
    source_file: parts.sourceFile,
    extracted_at: (parts.extractedAt ?? new Date()).toISOString(),
    total_pages: parts.totalPages,
    extractor_version: EXTRACTOR_VERSION,
  };

  const record: ReportRecord = {
    metadata,
    report: {
      provider: PROVIDER_NAME,
      ...parts.parsed.report,
    },
    field: { ...parts.parsed.field },
    analysis: {
      total_area_hectares: parts.parsed.analysis.total_area_hectares,
      total_area_percent: parts.parsed.analysis.total_area_percent,
      levels: parts.parsed.analysis.levels.map((entry) => ({ ...entry })),
    },
    additional_info: parts.parsed.additional_info,
    map_image: { ...parts.mapImage },
  };

  return deepFreeze(record);
}

/**
 * Copy of a record without base64 image bytes, for transport
 */
export function stripImageData(record: ReportRecord): ReportRecord {
  if (record.map_image.source !== 'embedded' && record.map_image.source !== 'page_render') {
    return record;
  }
  if (record.map_image.data_base64 === undefined) return record;

  const { data_base64: _dropped, ...mapImage } = record.map_image;
  return deepFreeze({ ...record, map_image: mapImage });
}
