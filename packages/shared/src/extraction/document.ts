/**
 * Document and Asset Host Contracts
 *
 * The extraction engine only talks to a PDF through ReportDocument and to the
 * asset host through AssetUploader. The service wires pdfjs/pdf-lib and
 * Cloudinary behind them; tests substitute in-process fakes.
 */

import type { TextBlock } from './blocks';

/**
 * An embedded raster image as stored in the PDF
 */
export interface EmbeddedImage {
  /** XObject resource name, e.g. "Im1" */
  name: string;
  /** Output format once materialised (jpeg, png, jpx) */
  format: string;
  width: number;
  height: number;
  /** Size of the encoded stream in the file */
  byteSize: number;
  /** Encoded image bytes, or null when the encoding cannot be turned into a file */
  read(): Promise<Uint8Array | null>;
}

export interface RenderedPage {
  format: 'png';
  width: number;
  height: number;
  dpi: number;
  data: Uint8Array;
}

/**
 * An open PDF. Owned by exactly one extraction and closed on every exit path.
 */
export interface ReportDocument {
  readonly sourceName: string;
  readonly pageCount: number;
  getTextBlocks(pageIndex: number): Promise<TextBlock[]>;
  listImages(pageIndex: number): Promise<EmbeddedImage[]>;
  renderPage(pageIndex: number, dpi: number): Promise<RenderedPage>;
  close(): Promise<void>;
}

export type DocumentSource =
  | { kind: 'path'; path: string }
  | { kind: 'bytes'; data: Uint8Array; sourceName: string };

/**
 * Opens a document; rejects when the input is not a readable PDF.
 */
export type DocumentOpener = (source: DocumentSource) => Promise<ReportDocument>;

// ============================================================================
// Asset upload
// ============================================================================

export interface AssetUploadRequest {
  data: Uint8Array;
  format: string;
  folder: string;
  publicId: string;
}

export interface UploadedAsset {
  url: string;
  publicId: string;
  width: number;
  height: number;
  format: string;
  bytes: number;
}

export interface AssetUploader {
  readonly folder: string;
  upload(request: AssetUploadRequest): Promise<UploadedAsset>;
}

/**
 * Raised by uploaders when the asset host rejects an upload
 */
export class AssetUploadError extends Error {
  constructor(
    message: string,
    readonly httpCode?: number
  ) {
    super(message);
    this.name = 'AssetUploadError';
  }
}
