/**
 * Extraction Engine
 */

export type { TextBlock, NormalizedText } from './blocks';
export { normalizeBlocks, MIN_BLOCK_LENGTH } from './blocks';

export type { TextView, CascadeScope, CascadeStep, CascadeHit } from './cascade';
export { runCascade, resolveScope, parseNumber } from './cascade';

export { detectAnalysisType } from './detector';

export {
  SURVEY_DATE_CASCADE,
  extractSurveyDate,
  REPORT_TYPE_PHRASES,
  extractReportType,
  ANALYSIS_NAME_PATTERN,
  ANALYSIS_NAME_MAX_LENGTH,
  ANALYSIS_NAME_CASCADE,
  extractAnalysisName,
  KNOWN_CROPS,
  CROP_STOP_WORDS,
  CROP_CASCADE,
  extractCrop,
  BBCH_PATTERN,
  GROWING_STAGE_CASCADE,
  extractGrowingStage,
  HECTARE_PATTERN,
  FIELD_AREA_CASCADE,
  extractFieldArea,
  TEST_COMMENT,
  ADDITIONAL_INFO_MAX_LENGTH,
  ADDITIONAL_INFO_CASCADE,
  extractAdditionalInfo,
} from './patterns';

export { extractLevels, EXCLUSION_LOOKBEHIND } from './levels';

export type { TotalArea } from './reconciler';
export {
  HECTARES_AND_PERCENT_PATTERN,
  PERCENT_ONLY_PATTERN,
  totalAreaCascade,
  deriveTotalHectares,
  reconcileTotalArea,
} from './reconciler';

export type {
  EmbeddedImage,
  RenderedPage,
  ReportDocument,
  DocumentSource,
  DocumentOpener,
  AssetUploadRequest,
  UploadedAsset,
  AssetUploader,
} from './document';
export { AssetUploadError } from './document';

export type { LocatedImage, PublishOptions } from './map-image';
export {
  DEFAULT_MAP_PAGE_INDEX,
  DEFAULT_RENDER_DPI,
  selectLargestImage,
  locateMapImage,
  generateMapPublicId,
  publishMapImage,
  extractMapImage,
} from './map-image';

export type { ParsedReportText } from './parser';
export { parseReportText } from './parser';

export type { ReportParts } from './assembler';
export { PROVIDER_NAME, EXTRACTOR_VERSION, assembleReportRecord, stripImageData } from './assembler';

export type { ExtractOptions } from './extractor';
export { extractReport, runExtraction } from './extractor';
