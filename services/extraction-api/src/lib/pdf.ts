/**
 * PDF Document Adapter
 *
 * Opens a report with pdfjs-dist (text and rendering) and pdf-lib (embedded
 * image streams) and exposes it as a ReportDocument.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { createRequire } from 'node:module';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { PDFDocument } from 'pdf-lib';
import { createCanvas } from '@napi-rs/canvas';
import {
  logger,
  type DocumentOpener,
  type DocumentSource,
  type EmbeddedImage,
  type RenderedPage,
  type ReportDocument,
  type TextBlock,
} from '@dronescan/shared';
import { listPageImages } from './pdf-images';

// Configure worker for Node.js environment
const moduleRequire = createRequire(import.meta.url);
pdfjsLib.GlobalWorkerOptions.workerSrc = moduleRequire.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');

type PdfjsDocument = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;

/**
 * Build text blocks for a page, one per visual line.
 *
 * Groups text items by Y position to preserve line structure; lines are
 * returned top to bottom with items joined left to right.
 */
async function pageTextBlocks(pdf: PdfjsDocument, pageIndex: number): Promise<TextBlock[]> {
  const page = await pdf.getPage(pageIndex + 1);
  const { height } = page.getViewport({ scale: 1 });
  const textContent = await page.getTextContent();

  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of textContent.items) {
    if (!('str' in item) || item.str.trim() === '') continue;

    // Text on the same visual line may have slight Y variations
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // PDF space grows upwards: sort Y descending for top to bottom
  const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);

  const blocks: TextBlock[] = [];
  for (const y of sortedYPositions) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const text = lineItems.map((item) => item.str).join(' ').trim();
    if (text) {
      blocks.push({ x: lineItems[0].x, y: Math.round(height - y), text });
    }
  }

  return blocks;
}

async function renderPdfPage(
  pdf: PdfjsDocument,
  pageIndex: number,
  dpi: number
): Promise<RenderedPage> {
  const page = await pdf.getPage(pageIndex + 1);
  const viewport = page.getViewport({ scale: dpi / 72 });

  const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
  const canvasContext = canvas.getContext('2d');
  const renderParams = { canvasContext, canvas, viewport };
  await page.render(renderParams).promise;

  const data = await canvas.encode('png');
  page.cleanup();

  return {
    format: 'png',
    width: canvas.width,
    height: canvas.height,
    dpi,
    data: new Uint8Array(data),
  };
}

class PdfReportDocument implements ReportDocument {
  constructor(
    readonly sourceName: string,
    private readonly pdf: PdfjsDocument,
    private readonly pdfLibDoc: PDFDocument
  ) {}

  get pageCount(): number {
    return this.pdf.numPages;
  }

  getTextBlocks(pageIndex: number): Promise<TextBlock[]> {
    return pageTextBlocks(this.pdf, pageIndex);
  }

  async listImages(pageIndex: number): Promise<EmbeddedImage[]> {
    return listPageImages(this.pdfLibDoc, pageIndex);
  }

  renderPage(pageIndex: number, dpi: number): Promise<RenderedPage> {
    return renderPdfPage(this.pdf, pageIndex, dpi);
  }

  async close(): Promise<void> {
    await this.pdf.destroy();
  }
}

async function readSource(source: DocumentSource): Promise<{ data: Uint8Array; sourceName: string }> {
  if (source.kind === 'path') {
    const data = new Uint8Array(await fs.readFile(source.path));
    return { data, sourceName: path.basename(source.path) };
  }
  return { data: source.data, sourceName: source.sourceName };
}

/**
 * Open a PDF from a path or from bytes. Rejects when the bytes are not a PDF.
 */
export const openPdfDocument: DocumentOpener = async (source) => {
  const { data, sourceName } = await readSource(source);

  logger.debug('Opening PDF document', { source_file: sourceName, bytes: data.byteLength });

  // pdfjs takes ownership of the buffer it is given
  const pdf = await pdfjsLib.getDocument({ data: data.slice(), isEvalSupported: false }).promise;
  try {
    const pdfLibDoc = await PDFDocument.load(data, { ignoreEncryption: true, updateMetadata: false });
    return new PdfReportDocument(sourceName, pdf, pdfLibDoc);
  } catch (error) {
    await pdf.destroy();
    throw error;
  }
};
