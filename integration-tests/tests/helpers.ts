/**
 * Test Helpers
 *
 * In-process stand-ins for PDF documents and the asset host, plus sample
 * page-1 text blocks.
 */

import {
  AssetUploadError,
  type AssetUploadRequest,
  type AssetUploader,
  type EmbeddedImage,
  type RenderedPage,
  type ReportDocument,
  type TextBlock,
  type UploadedAsset,
} from '@dronescan/shared';

export interface FakePage {
  blocks?: TextBlock[];
  images?: EmbeddedImage[];
}

/**
 * Build text blocks from lines, top to bottom
 */
export function blocksOf(lines: readonly string[]): TextBlock[] {
  return lines.map((text, index) => ({ x: 40, y: 60 + index * 20, text }));
}

/**
 * An embedded image whose encoded stream is `byteSize` bytes long
 */
export function fakeImage(
  name: string,
  byteSize: number,
  options: { format?: string; width?: number; height?: number; readable?: boolean } = {}
): EmbeddedImage {
  return {
    name,
    format: options.format ?? 'jpeg',
    width: options.width ?? 100,
    height: options.height ?? 100,
    byteSize,
    read: async () => (options.readable === false ? null : new Uint8Array(byteSize).fill(7)),
  };
}

export const RENDER_WIDTH = 1241;
export const RENDER_HEIGHT = 1754;
export const RENDER_BYTES = 4096;

export class FakeReportDocument implements ReportDocument {
  closed = false;
  readonly renderCalls: Array<{ pageIndex: number; dpi: number }> = [];

  constructor(
    readonly sourceName: string,
    private readonly pages: FakePage[],
    private readonly failures: { text?: Error; render?: Error } = {}
  ) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async getTextBlocks(pageIndex: number): Promise<TextBlock[]> {
    if (this.failures.text) throw this.failures.text;
    return this.pages[pageIndex]?.blocks ?? [];
  }

  async listImages(pageIndex: number): Promise<EmbeddedImage[]> {
    return this.pages[pageIndex]?.images ?? [];
  }

  async renderPage(pageIndex: number, dpi: number): Promise<RenderedPage> {
    this.renderCalls.push({ pageIndex, dpi });
    if (this.failures.render) throw this.failures.render;
    return {
      format: 'png',
      width: RENDER_WIDTH,
      height: RENDER_HEIGHT,
      dpi,
      data: new Uint8Array(RENDER_BYTES),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeUploader implements AssetUploader {
  readonly folder = 'drone-map-images';
  readonly requests: AssetUploadRequest[] = [];

  constructor(private readonly failure?: Error) {}

  async upload(request: AssetUploadRequest): Promise<UploadedAsset> {
    this.requests.push(request);
    if (this.failure) throw this.failure;
    return {
      url: `https://assets.example.test/${request.folder}/${request.publicId}.${request.format}`,
      publicId: `${request.folder}/${request.publicId}`,
      width: 1200,
      height: 900,
      format: request.format,
      bytes: request.data.byteLength,
    };
  }
}

export function rejectingUploader(message: string, httpCode?: number): FakeUploader {
  return new FakeUploader(new AssetUploadError(message, httpCode));
}

// ============================================================================
// Sample page-1 text
// ============================================================================

export const PLANT_STRESS_PAGE = blocksOf([
  'Crop Monitoring',
  'p1',
  'Survey date: 14-06-2024',
  'Analysis name: Plant stress June',
  'Crop: sugar beet',
  'Growing stage: BBCH 69',
  'Field area: 45.30 Hectare',
  'PLANT STRESS',
  'Total area PLANT STRESS: 22.04 ha = 69% field',
  'Fine 31% 14.05',
  'Potential Plant Stress 10% 4.53',
  'Plant Stress 59% 17.51',
  'Additional Information (or recommendation): Irrigate the north-east corner',
  'Powered by Agremo',
]);

export const WEED_DETECTION_PAGE = blocksOf([
  'Plant Health Monitoring',
  'Survey date: 02-05-2023',
  'WEED DETECTION',
  'Crop: winter wheat',
  'Growing stage: BBCH30',
  'Field area: 18 Hectare',
  'Fine 50% 9.00',
  'Low Weed Pressure 20% 3.60',
  'Medium Weed Pressure 20% 4.5',
  'High Weed Pressure 10% 2.25',
  'Powered by Agremo',
]);

export const FLOWERING_PAGE = blocksOf([
  'Crop Monitoring',
  'Analysis name: Rapeseed bloom',
  'Crop: oilseed rape',
  'FLOWERING',
  'No Flowering 40% 8.00',
  'Flowering 35% 7.00',
  'Full Flowering 25% 5.00',
  'Test comment',
]);
