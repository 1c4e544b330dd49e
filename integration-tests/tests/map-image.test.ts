/**
 * Map Image Locator and Publishing Tests
 */

import {
  locateMapImage,
  publishMapImage,
  extractMapImage,
  selectLargestImage,
  generateMapPublicId,
  AssetUploadError,
} from '@dronescan/shared';
import {
  FakeReportDocument,
  FakeUploader,
  fakeImage,
  rejectingUploader,
  RENDER_BYTES,
  RENDER_HEIGHT,
  RENDER_WIDTH,
} from './helpers';

function twoPageDocument(images = [fakeImage('Im1', 500), fakeImage('Im2', 50000, { width: 1200, height: 900 })]) {
  return new FakeReportDocument('report.pdf', [{ blocks: [] }, { images }]);
}

describe('selectLargestImage', () => {
  it('should pick the image with the most encoded bytes', () => {
    const images = [fakeImage('Im1', 500), fakeImage('Im2', 50000), fakeImage('Im3', 800)];

    expect(selectLargestImage(images)?.name).toBe('Im2');
  });

  it('should keep the first image on ties', () => {
    const images = [fakeImage('Im1', 700), fakeImage('Im2', 700)];

    expect(selectLargestImage(images)?.name).toBe('Im1');
  });

  it('should return null for a page without images', () => {
    expect(selectLargestImage([])).toBeNull();
  });
});

describe('locateMapImage', () => {
  it('should return the largest embedded image of page 2', async () => {
    const located = await locateMapImage(twoPageDocument());

    expect(located).toMatchObject({
      source: 'embedded',
      format: 'jpeg',
      width: 1200,
      height: 900,
      sizeBytes: 50000,
    });
  });

  it('should render the page at 150 DPI when it has no images', async () => {
    const document = twoPageDocument([]);
    const located = await locateMapImage(document);

    expect(located).toMatchObject({
      source: 'page_render',
      format: 'png',
      width: RENDER_WIDTH,
      height: RENDER_HEIGHT,
      sizeBytes: RENDER_BYTES,
      dpi: 150,
    });
    expect(document.renderCalls).toEqual([{ pageIndex: 1, dpi: 150 }]);
  });

  it('should render the page when the largest image cannot be read', async () => {
    const document = twoPageDocument([fakeImage('Im1', 50000, { format: 'ccittfaxdecode', readable: false })]);
    const located = await locateMapImage(document);

    expect(located.source).toBe('page_render');
  });

  it('should report a missing page for single-page documents', async () => {
    const document = new FakeReportDocument('report.pdf', [{ images: [fakeImage('Im1', 500)] }]);

    expect(await locateMapImage(document)).toEqual({ source: 'error', error: 'Page not found' });
  });

  it('should report a missing page for negative indexes', async () => {
    expect(await locateMapImage(twoPageDocument(), -1)).toEqual({
      source: 'error',
      error: 'Page not found',
    });
  });

  it('should locate images on another page when asked', async () => {
    const document = new FakeReportDocument('report.pdf', [
      { images: [fakeImage('Logo', 900)] },
      { images: [] },
    ]);

    expect(await locateMapImage(document, 0)).toMatchObject({ source: 'embedded', sizeBytes: 900 });
  });
});

describe('publishMapImage', () => {
  it('should describe the image without bytes by default', async () => {
    const located = await locateMapImage(twoPageDocument());

    expect(await publishMapImage(located)).toEqual({
      source: 'embedded',
      format: 'jpeg',
      width: 1200,
      height: 900,
      size_bytes: 50000,
    });
  });

  it('should attach base64 bytes when asked', async () => {
    const located = await locateMapImage(
      twoPageDocument([fakeImage('Im1', 3, { width: 1, height: 1 })])
    );
    const published = await publishMapImage(located, { includeImageData: true });

    expect(published).toEqual({
      source: 'embedded',
      format: 'jpeg',
      width: 1,
      height: 1,
      size_bytes: 3,
      data_base64: Buffer.from([7, 7, 7]).toString('base64'),
    });
  });

  it('should upload the located image and return the reference', async () => {
    const uploader = new FakeUploader();
    const located = await locateMapImage(twoPageDocument());
    const published = await publishMapImage(located, {
      uploader,
      generatePublicId: () => 'map_TEST',
    });

    expect(published).toEqual({
      source: 'cloud_upload',
      origin: 'embedded',
      format: 'jpeg',
      width: 1200,
      height: 900,
      size_bytes: 50000,
      url: 'https://assets.example.test/drone-map-images/map_TEST.jpeg',
      public_id: 'drone-map-images/map_TEST',
    });
    expect(uploader.requests).toHaveLength(1);
    expect(uploader.requests[0].folder).toBe('drone-map-images');
    expect(uploader.requests[0].publicId).toBe('map_TEST');
    expect(uploader.requests[0].data.byteLength).toBe(50000);
  });

  it('should record the render origin of uploaded renders', async () => {
    const located = await locateMapImage(twoPageDocument([]));
    const published = await publishMapImage(located, {
      uploader: new FakeUploader(),
      generatePublicId: () => 'map_RENDER',
    });

    expect(published).toMatchObject({ source: 'cloud_upload', origin: 'page_render', format: 'png' });
  });

  it('should turn an asset host rejection into an error result', async () => {
    const located = await locateMapImage(twoPageDocument());
    const published = await publishMapImage(located, {
      uploader: rejectingUploader('quota exceeded', 420),
    });

    expect(published).toEqual({ source: 'error', error: 'Upload failed: quota exceeded' });
  });

  it('should turn unexpected upload errors into an error result', async () => {
    const located = await locateMapImage(twoPageDocument());
    const published = await publishMapImage(located, {
      uploader: new FakeUploader(new Error('socket hang up')),
    });

    expect(published).toEqual({ source: 'error', error: 'Upload failed: socket hang up' });
  });

  it('should pass lookup errors through', async () => {
    expect(await publishMapImage({ source: 'error', error: 'Page not found' })).toEqual({
      source: 'error',
      error: 'Page not found',
    });
  });
});

describe('extractMapImage', () => {
  it('should degrade render failures to an error result', async () => {
    const document = new FakeReportDocument('report.pdf', [{}, { images: [] }], {
      render: new Error('canvas unavailable'),
    });

    expect(await extractMapImage(document)).toEqual({ source: 'error', error: 'canvas unavailable' });
  });

  it('should honour the page index and DPI options', async () => {
    const document = new FakeReportDocument('report.pdf', [{ images: [] }]);
    const result = await extractMapImage(document, { pageIndex: 0, dpi: 72 });

    expect(result).toMatchObject({ source: 'page_render', dpi: 72 });
    expect(document.renderCalls).toEqual([{ pageIndex: 0, dpi: 72 }]);
  });
});

describe('generateMapPublicId', () => {
  it('should prefix a ULID', () => {
    expect(generateMapPublicId()).toMatch(/^map_[0-9A-HJKMNP-TV-Z]{26}$/);
  });
});

describe('AssetUploadError', () => {
  it('should carry the HTTP code', () => {
    const error = new AssetUploadError('quota exceeded', 420);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AssetUploadError');
    expect(error.httpCode).toBe(420);
  });
});
