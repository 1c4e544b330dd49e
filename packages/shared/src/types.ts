/**
 * Shared TypeScript Types
 *
 * Types for the drone report extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Analysis Classification
// ============================================================================

export type AnalysisTypeKey = 'plant_stress' | 'flowering' | 'weed_detection';

export type Severity = 'healthy' | 'low' | 'moderate' | 'high';

export const SEVERITIES: readonly Severity[] = ['healthy', 'low', 'moderate', 'high'];

export type ReportType = 'Crop Monitoring' | 'Plant Health Monitoring';

// ============================================================================
// Report Record
// ============================================================================

export interface ReportMetadata {
  source_file: string;
  extracted_at: string;
  total_pages: number;
  extractor_version: string;
}

export interface ReportSection {
  provider: string;
  type: ReportType | null;
  /** DD-MM-YYYY */
  survey_date: string | null;
  analysis_name: string | null;
  analysis_type: AnalysisTypeKey | null;
}

export interface FieldSection {
  crop: string | null;
  /** BBCH growth stage code, e.g. BBCH69 */
  growing_stage: string | null;
  area_hectares: number | null;
}

export interface LevelEntry {
  level: string;
  severity: Severity;
  percentage: number;
  area_hectares: number;
}

export interface AnalysisSection {
  total_area_hectares: number | null;
  /** 0-100 */
  total_area_percent: number | null;
  levels: LevelEntry[];
}

export interface ReportRecord {
  metadata: ReportMetadata;
  report: ReportSection;
  field: FieldSection;
  analysis: AnalysisSection;
  additional_info: string | null;
  map_image: MapImageResult;
}

// ============================================================================
// Map Image
// ============================================================================

export type ImageOrigin = 'embedded' | 'page_render';

export interface LocatedMapImage {
  source: ImageOrigin;
  format: string;
  width: number;
  height: number;
  size_bytes: number;
  dpi?: number;
  data_base64?: string;
}

export interface UploadedMapImage {
  source: 'cloud_upload';
  origin: ImageOrigin;
  format: string;
  width: number;
  height: number;
  size_bytes: number;
  url: string;
  public_id: string;
}

export interface MapImageError {
  source: 'error';
  error: string;
}

export type MapImageResult = LocatedMapImage | UploadedMapImage | MapImageError;

// ============================================================================
// API Types
// ============================================================================

export interface ExtractRequest {
  /** Absolute path to the PDF file (legacy support) */
  pdfPath?: string;
  /** Base64-encoded PDF content */
  pdfContent?: string;
}

export type ExtractOutcome =
  | { success: true; extractedData: ReportRecord }
  | { success: false; error: string };

/** Body of POST /extract-drone-data responses */
export type ExtractResponse = ExtractOutcome;

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

export interface HealthResponse {
  status: 'healthy';
  service: string;
  version: string;
}
