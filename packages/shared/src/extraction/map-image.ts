/**
 * Map Image Location and Publishing
 *
 * The field map lives on page 2 of a report. It is normally the largest
 * embedded image there (icons and logos are small); pages without embedded
 * images are rendered instead.
 */

import { ulid } from 'ulid';
import type { ImageOrigin, MapImageError, MapImageResult } from '../types';
import type { AssetUploader, EmbeddedImage, ReportDocument } from './document';
import { AssetUploadError } from './document';
import { logger } from '../logger';
import { mapImageCounter, uploadDurationHistogram } from '../metrics';

export const DEFAULT_MAP_PAGE_INDEX = 1;
export const DEFAULT_RENDER_DPI = 150;

/**
 * A located map image, bytes included. Never leaves the extraction step as is.
 */
export interface LocatedImage {
  source: ImageOrigin;
  format: string;
  width: number;
  height: number;
  sizeBytes: number;
  dpi?: number;
  data: Uint8Array;
}

function mapImageError(error: string): MapImageError {
  return { source: 'error', error };
}

/**
 * Pick the image with the largest encoded size; the first one wins ties.
 */
export function selectLargestImage(images: readonly EmbeddedImage[]): EmbeddedImage | null {
  let largest: EmbeddedImage | null = null;
  for (const image of images) {
    if (!largest || image.byteSize > largest.byteSize) {
      largest = image;
    }
  }
  return largest;
}

/**
 * Locate the map image on a page.
 *
 * An out-of-range page index is the only lookup error; any valid page yields
 * either its largest embedded image or a render of the whole page.
 */
export async function locateMapImage(
  document: ReportDocument,
  pageIndex: number = DEFAULT_MAP_PAGE_INDEX,
  dpi: number = DEFAULT_RENDER_DPI
): Promise<LocatedImage | MapImageError> {
  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= document.pageCount) {
    return mapImageError('Page not found');
  }

  const largest = selectLargestImage(await document.listImages(pageIndex));
  if (largest) {
    const data = await largest.read();
    if (data) {
      return {
        source: 'embedded',
        format: largest.format,
        width: largest.width,
        height: largest.height,
        sizeBytes: data.byteLength,
        data,
      };
    }
    logger.warn('Largest embedded image could not be read, rendering page instead', {
      page_index: pageIndex,
      image: largest.name,
      format: largest.format,
    });
  }

  const rendered = await document.renderPage(pageIndex, dpi);
  return {
    source: 'page_render',
    format: rendered.format,
    width: rendered.width,
    height: rendered.height,
    sizeBytes: rendered.data.byteLength,
    dpi: rendered.dpi,
    data: rendered.data,
  };
}

export interface PublishOptions {
  /** Uploads are skipped when no uploader is configured */
  uploader?: AssetUploader | null;
  /** Attach base64 image bytes to non-uploaded results */
  includeImageData?: boolean;
  generatePublicId?: () => string;
}

/**
 * Public IDs are ULIDs, so they sort by upload time
 */
export function generateMapPublicId(): string {
  return `map_${ulid()}`;
}

async function uploadLocatedImage(
  located: LocatedImage,
  uploader: AssetUploader,
  publicId: string
): Promise<MapImageResult> {
  const startTime = Date.now();
  try {
    const uploaded = await uploader.upload({
      data: located.data,
      format: located.format,
      folder: uploader.folder,
      publicId,
    });
    uploadDurationHistogram.observe({ status: 'success' }, (Date.now() - startTime) / 1000);

    return {
      source: 'cloud_upload',
      origin: located.source,
      format: uploaded.format,
      width: uploaded.width,
      height: uploaded.height,
      size_bytes: uploaded.bytes,
      url: uploaded.url,
      public_id: uploaded.publicId,
    };
  } catch (error) {
    uploadDurationHistogram.observe({ status: 'failed' }, (Date.now() - startTime) / 1000);

    // Service and unexpected failures end up the same way: only map_image degrades
    if (error instanceof AssetUploadError) {
      logger.warn('Asset host rejected map image upload', {
        public_id: publicId,
        http_code: error.httpCode,
        reason: error.message,
      });
      return mapImageError(`Upload failed: ${error.message}`);
    }
    logger.error('Unexpected error uploading map image', error, { public_id: publicId });
    return mapImageError(
      `Upload failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Turn a located image into the record's map_image section.
 */
export async function publishMapImage(
  located: LocatedImage | MapImageError,
  options: PublishOptions = {}
): Promise<MapImageResult> {
  if (located.source === 'error') return located;

  if (options.uploader) {
    const publicId = (options.generatePublicId ?? generateMapPublicId)();
    return uploadLocatedImage(located, options.uploader, publicId);
  }

  return {
    source: located.source,
    format: located.format,
    width: located.width,
    height: located.height,
    size_bytes: located.sizeBytes,
    ...(located.dpi !== undefined ? { dpi: located.dpi } : {}),
    ...(options.includeImageData ? { data_base64: Buffer.from(located.data).toString('base64') } : {}),
  };
}

/**
 * Locate and publish the map image. Failures degrade to an error result.
 */
export async function extractMapImage(
  document: ReportDocument,
  options: PublishOptions & { pageIndex?: number; dpi?: number } = {}
): Promise<MapImageResult> {
  let result: MapImageResult;
  try {
    const located = await locateMapImage(document, options.pageIndex, options.dpi);
    result = await publishMapImage(located, options);
  } catch (error) {
    logger.error('Map image extraction failed', error, { page_index: options.pageIndex });
    result = mapImageError(error instanceof Error ? error.message : String(error));
  }

  mapImageCounter.inc({ source: result.source });
  return result;
}
