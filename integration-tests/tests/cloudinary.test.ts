/**
 * Cloudinary Uploader Tests
 */

import { AssetUploadError, type CloudinaryConfig } from '@dronescan/shared';
import {
  CloudinaryUploader,
  createCloudinaryUploader,
  type CloudinaryUploadFn,
} from '@dronescan/extraction-api/lib/cloudinary';

const settings: CloudinaryConfig = {
  cloudName: 'demo-cloud',
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  folder: 'drone-map-images',
};

const request = {
  data: new Uint8Array([1, 2, 3]),
  format: 'png',
  folder: 'drone-map-images',
  publicId: 'map_TEST',
};

describe('CloudinaryUploader', () => {
  it('should send credentials and placement with each upload', async () => {
    const uploadFn = vi.fn<CloudinaryUploadFn>(async () => ({
      secure_url: 'https://res.cloudinary.example/demo-cloud/image/upload/drone-map-images/map_TEST.png',
      public_id: 'drone-map-images/map_TEST',
      width: 1241,
      height: 1754,
      format: 'png',
      bytes: 3,
    }));
    const uploader = new CloudinaryUploader(settings, uploadFn);

    const uploaded = await uploader.upload(request);

    expect(uploadFn).toHaveBeenCalledWith('data:image/png;base64,AQID', {
      cloud_name: 'demo-cloud',
      api_key: 'test-key',
      api_secret: 'test-secret',
      folder: 'drone-map-images',
      public_id: 'map_TEST',
      resource_type: 'image',
      overwrite: false,
    });
    expect(uploaded).toEqual({
      url: 'https://res.cloudinary.example/demo-cloud/image/upload/drone-map-images/map_TEST.png',
      publicId: 'drone-map-images/map_TEST',
      width: 1241,
      height: 1754,
      format: 'png',
      bytes: 3,
    });
  });

  it('should expose the configured folder', () => {
    expect(new CloudinaryUploader(settings).folder).toBe('drone-map-images');
  });

  it('should convert service rejections into AssetUploadError', async () => {
    const uploader = new CloudinaryUploader(settings, async () => {
      throw { message: 'Invalid Signature', http_code: 401 };
    });

    const error = await uploader.upload(request).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AssetUploadError);
    expect(error).toMatchObject({ message: 'Invalid Signature', httpCode: 401 });
  });

  it('should convert thrown errors into AssetUploadError', async () => {
    const uploader = new CloudinaryUploader(settings, async () => {
      throw new Error('getaddrinfo ENOTFOUND');
    });

    await expect(uploader.upload(request)).rejects.toThrow(AssetUploadError);
  });
});

describe('createCloudinaryUploader', () => {
  it('should disable uploads without credentials', () => {
    expect(createCloudinaryUploader(null)).toBeNull();
  });

  it('should create an uploader for configured credentials', () => {
    expect(createCloudinaryUploader(settings)).toBeInstanceOf(CloudinaryUploader);
  });
});
