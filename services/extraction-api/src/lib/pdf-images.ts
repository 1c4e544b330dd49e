/**
 * Embedded Image Enumeration
 *
 * Walks a page's XObject resources with pdf-lib. JPEG and JPEG 2000 streams
 * are files as stored; 8-bit Flate streams in gray or RGB are inflated and
 * re-encoded as PNG. Anything else is listed but cannot be read.
 */

import pako from 'pako';
import sharp from 'sharp';
import {
  PDFArray,
  PDFDict,
  PDFName,
  PDFNumber,
  PDFRawStream,
  type PDFContext,
  type PDFDocument,
  type PDFObject,
} from 'pdf-lib';
import { logger, type EmbeddedImage } from '@dronescan/shared';

type Channels = 1 | 3;

function nameOf(obj: PDFObject | undefined): string | null {
  return obj instanceof PDFName ? obj.asString().replace(/^\//, '') : null;
}

function numberOf(obj: PDFObject | undefined, fallback: number): number {
  return obj instanceof PDFNumber ? obj.asNumber() : fallback;
}

function resolveDict(context: PDFContext, obj: PDFObject | undefined): PDFDict | null {
  const resolved = obj instanceof PDFDict ? obj : context.lookup(obj);
  return resolved instanceof PDFDict ? resolved : null;
}

/**
 * Filter chain of a stream. A single name and a one-element array are the same.
 */
function filtersOf(context: PDFContext, dict: PDFDict): string[] {
  const filter = dict.get(PDFName.of('Filter'));
  const single = nameOf(filter);
  if (single) return [single];
  if (!(filter instanceof PDFArray)) return [];

  const names: string[] = [];
  for (let i = 0; i < filter.size(); i++) {
    const name = nameOf(context.lookup(filter.get(i)));
    if (name) names.push(name);
  }
  return names;
}

function channelsOf(context: PDFContext, dict: PDFDict): Channels | null {
  const colorSpace = dict.get(PDFName.of('ColorSpace'));
  const direct = nameOf(colorSpace);
  if (direct === 'DeviceGray') return 1;
  if (direct === 'DeviceRGB') return 3;

  const resolved = colorSpace instanceof PDFArray ? colorSpace : context.lookup(colorSpace);
  if (resolved instanceof PDFArray && resolved.size() >= 2) {
    if (nameOf(context.lookup(resolved.get(0))) !== 'ICCBased') return null;
    const profile = context.lookup(resolved.get(1));
    const profileDict = profile instanceof PDFRawStream ? profile.dict : resolveDict(context, profile);
    const components = profileDict ? numberOf(profileDict.get(PDFName.of('N')), 0) : 0;
    if (components === 1) return 1;
    if (components === 3) return 3;
  }
  return null;
}

function hasPredictor(context: PDFContext, dict: PDFDict): boolean {
  const params = resolveDict(context, dict.get(PDFName.of('DecodeParms')));
  return params ? numberOf(params.get(PDFName.of('Predictor')), 1) > 1 : false;
}

function formatForFilters(filters: readonly string[]): string {
  if (filters.length !== 1) return 'unknown';
  switch (filters[0]) {
    case 'DCTDecode':
      return 'jpeg';
    case 'JPXDecode':
      return 'jpx';
    case 'FlateDecode':
      return 'png';
    default:
      return filters[0].toLowerCase();
  }
}

async function flateToPng(
  context: PDFContext,
  dict: PDFDict,
  contents: Uint8Array,
  width: number,
  height: number
): Promise<Uint8Array | null> {
  if (numberOf(dict.get(PDFName.of('BitsPerComponent')), 8) !== 8) return null;
  if (hasPredictor(context, dict)) return null;

  const channels = channelsOf(context, dict);
  if (!channels) return null;

  const pixels = pako.inflate(contents);
  if (pixels.byteLength !== width * height * channels) return null;

  const png = await sharp(Buffer.from(pixels), { raw: { width, height, channels } })
    .png()
    .toBuffer();
  return new Uint8Array(png);
}

function toEmbeddedImage(
  context: PDFContext,
  name: string,
  stream: PDFRawStream
): EmbeddedImage | null {
  const dict = stream.dict;
  if (nameOf(dict.get(PDFName.of('Subtype'))) !== 'Image') return null;

  const width = numberOf(dict.get(PDFName.of('Width')), 0);
  const height = numberOf(dict.get(PDFName.of('Height')), 0);
  if (width <= 0 || height <= 0) return null;

  const filters = filtersOf(context, dict);
  const format = formatForFilters(filters);
  const contents = stream.getContents();

  return {
    name,
    format,
    width,
    height,
    byteSize: contents.byteLength,
    read: async () => {
      if (contents.byteLength === 0) return null;
      if (format === 'jpeg') {
        return contents[0] === 0xff && contents[1] === 0xd8 ? contents : null;
      }
      if (format === 'jpx') return contents;
      if (format === 'png') return flateToPng(context, dict, contents, width, height);
      return null;
    },
  };
}

/**
 * List the raster images referenced from a page's resources.
 *
 * @param pageIndex - Zero-based page index; out-of-range pages have no images
 */
export function listPageImages(pdfDoc: PDFDocument, pageIndex: number): EmbeddedImage[] {
  if (pageIndex < 0 || pageIndex >= pdfDoc.getPageCount()) return [];

  const context = pdfDoc.context;
  const resources = pdfDoc.getPage(pageIndex).node.Resources();
  if (!resources) return [];

  const xObjects = resolveDict(context, resources.get(PDFName.of('XObject')));
  if (!xObjects) return [];

  const images: EmbeddedImage[] = [];
  for (const [key, ref] of xObjects.entries()) {
    const name = nameOf(key) ?? key.toString();
    const stream = context.lookup(ref);
    if (!(stream instanceof PDFRawStream)) continue;

    const image = toEmbeddedImage(context, name, stream);
    if (image) images.push(image);
  }

  logger.debug('Listed page images', {
    page_index: pageIndex,
    images: images.map((image) => ({ name: image.name, format: image.format, bytes: image.byteSize })),
  });

  return images;
}
