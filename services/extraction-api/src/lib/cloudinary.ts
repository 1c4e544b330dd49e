/**
 * Cloudinary Asset Uploader
 *
 * Credentials travel with every upload call; the SDK's process-wide
 * configuration is never touched.
 */

import { v2 as cloudinary, type UploadApiOptions, type UploadApiResponse } from 'cloudinary';
import {
  AssetUploadError,
  logger,
  type AssetUploadRequest,
  type AssetUploader,
  type CloudinaryConfig,
  type UploadedAsset,
} from '@dronescan/shared';

/** Fields of an upload response the uploader reads */
export type CloudinaryUploadResult = Pick<
  UploadApiResponse,
  'secure_url' | 'public_id' | 'width' | 'height' | 'format' | 'bytes'
>;

export type CloudinaryUploadFn = (
  file: string,
  options: UploadApiOptions
) => Promise<CloudinaryUploadResult>;

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  jpg: 'image/jpeg',
  jpx: 'image/jp2',
};

function toDataUri(data: Uint8Array, format: string): string {
  const mimeType = MIME_TYPES[format] ?? 'application/octet-stream';
  return `data:${mimeType};base64,${Buffer.from(data).toString('base64')}`;
}

/**
 * Cloudinary rejects with a plain { message, http_code } object, not an Error
 */
function toUploadError(error: unknown): AssetUploadError {
  if (error instanceof AssetUploadError) return error;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const message = typeof error.message === 'string' ? error.message : 'Unknown upload error';
    const httpCode =
      'http_code' in error && typeof error.http_code === 'number' ? error.http_code : undefined;
    return new AssetUploadError(message, httpCode);
  }
  return new AssetUploadError(String(error));
}

export class CloudinaryUploader implements AssetUploader {
  readonly folder: string;

  constructor(
    private readonly settings: CloudinaryConfig,
    private readonly uploadFn: CloudinaryUploadFn = (file, options) =>
      cloudinary.uploader.upload(file, options)
  ) {
    this.folder = settings.folder;
  }

  async upload(request: AssetUploadRequest): Promise<UploadedAsset> {
    logger.debug('Uploading map image', {
      folder: request.folder,
      public_id: request.publicId,
      bytes: request.data.byteLength,
    });

    let response: CloudinaryUploadResult;
    try {
      response = await this.uploadFn(toDataUri(request.data, request.format), {
        cloud_name: this.settings.cloudName,
        api_key: this.settings.apiKey,
        api_secret: this.settings.apiSecret,
        folder: request.folder,
        public_id: request.publicId,
        resource_type: 'image',
        overwrite: false,
      });
    } catch (error) {
      throw toUploadError(error);
    }

    logger.info('Map image uploaded', {
      public_id: response.public_id,
      bytes: response.bytes,
    });

    return {
      url: response.secure_url,
      publicId: response.public_id,
      width: response.width,
      height: response.height,
      format: response.format,
      bytes: response.bytes,
    };
  }
}

/**
 * Uploader for the configured account, or null when uploads are disabled
 */
export function createCloudinaryUploader(settings: CloudinaryConfig | null): CloudinaryUploader | null {
  return settings ? new CloudinaryUploader(settings) : null;
}
