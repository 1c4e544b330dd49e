/**
 * Report Extractor
 *
 * Runs one PDF through the engine: page-1 text rules, map image on the
 * configured page, assembly and output validation.
 */

import type { ExtractOutcome, ReportRecord } from '../types';
import type { AnalysisTypeConfig } from '../analysis-types/types';
import type { AssetUploader, DocumentOpener, DocumentSource, ReportDocument } from './document';
import { normalizeBlocks } from './blocks';
import { parseReportText } from './parser';
import { extractMapImage, DEFAULT_MAP_PAGE_INDEX, DEFAULT_RENDER_DPI } from './map-image';
import { assembleReportRecord } from './assembler';
import { validateReportRecord } from '../schemas';
import { withSourceFile } from '../context';
import { logger } from '../logger';
import { reportsProcessedCounter, extractionDurationHistogram } from '../metrics';

export interface ExtractOptions {
  /** Zero-based page holding the field map */
  mapPageIndex?: number;
  renderDpi?: number;
  uploader?: AssetUploader | null;
  includeImageData?: boolean;
  /** Defaults to the analysis type registry */
  bundles?: readonly AnalysisTypeConfig[];
  generatePublicId?: () => string;
  now?: () => Date;
}

/**
 * Extract a ReportRecord from an open document. The caller owns the handle.
 */
export async function extractReport(
  document: ReportDocument,
  options: ExtractOptions = {}
): Promise<ReportRecord> {
  return withSourceFile(document.sourceName, async () => {
    const startTime = Date.now();

    logger.info('Extracting report', { total_pages: document.pageCount });

    const blocks = document.pageCount > 0 ? await document.getTextBlocks(0) : [];
    const parsed = parseReportText(normalizeBlocks(blocks), options.bundles);

    const mapImage = await extractMapImage(document, {
      pageIndex: options.mapPageIndex ?? DEFAULT_MAP_PAGE_INDEX,
      dpi: options.renderDpi ?? DEFAULT_RENDER_DPI,
      uploader: options.uploader,
      includeImageData: options.includeImageData,
      generatePublicId: options.generatePublicId,
    });

    const record = assembleReportRecord({
      sourceFile: document.sourceName,
      totalPages: document.pageCount,
      parsed,
      mapImage,
      extractedAt: options.now?.(),
    });

    // Shape drift is reported, the record is still returned
    validateReportRecord(record);

    const analysisType = record.report.analysis_type ?? 'unknown';
    const durationSeconds = (Date.now() - startTime) / 1000;
    extractionDurationHistogram.observe({ analysis_type: analysisType, status: 'success' }, durationSeconds);
    reportsProcessedCounter.inc({ analysis_type: analysisType, status: 'success' });

    logger.info('Report extracted', {
      analysis_type: record.report.analysis_type,
      level_count: record.analysis.levels.length,
      map_image_source: record.map_image.source,
      duration_ms: Date.now() - startTime,
    });

    return record;
  });
}

function describeSource(source: DocumentSource): string {
  return source.kind === 'path' ? source.path : source.sourceName;
}

/**
 * Open, extract and close. Never throws: fatal failures become an error outcome.
 */
export async function runExtraction(
  source: DocumentSource,
  openDocument: DocumentOpener,
  options: ExtractOptions = {}
): Promise<ExtractOutcome> {
  let document: ReportDocument | null = null;

  try {
    document = await openDocument(source);
    const extractedData = await extractReport(document, options);
    return { success: true, extractedData };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Report extraction failed', error, { source_file: describeSource(source) });
    reportsProcessedCounter.inc({ analysis_type: 'unknown', status: 'failed' });
    return { success: false, error: `Failed to extract PDF data: ${message}` };
  } finally {
    if (document) {
      await closeQuietly(document);
    }
  }
}

async function closeQuietly(document: ReportDocument): Promise<void> {
  try {
    await document.close();
  } catch (error) {
    logger.warn('Failed to close document', {
      source_file: document.sourceName,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
