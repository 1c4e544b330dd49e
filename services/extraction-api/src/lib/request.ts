/**
 * Extraction Request Inputs
 *
 * Turns a validated request body into a DocumentSource, or a user-facing
 * error message. Nothing here opens the PDF.
 */

import fs from 'node:fs/promises';
import { constants as fsConstants, type Stats } from 'node:fs';
import type { DocumentSource, ExtractRequest } from '@dronescan/shared';

export const PDF_MAGIC = '%PDF';

/** Name recorded as source_file for inline uploads */
export const INLINE_SOURCE_NAME = 'upload.pdf';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URI_PREFIX = /^data:application\/pdf;base64,/i;

export type ResolvedInput = { ok: true; source: DocumentSource } | { ok: false; error: string };

function fail(error: string): ResolvedInput {
  return { ok: false, error };
}

function hasPdfMagic(data: Uint8Array): boolean {
  return Buffer.from(data.subarray(0, PDF_MAGIC.length)).toString('latin1') === PDF_MAGIC;
}

async function readHeader(filePath: string): Promise<Uint8Array> {
  const handle = await fs.open(filePath, 'r');
  try {
    const header = new Uint8Array(PDF_MAGIC.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    return header.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export async function resolvePathInput(pdfPath: string, maxFileSize: number): Promise<ResolvedInput> {
  let stats: Stats;
  try {
    stats = await fs.stat(pdfPath);
  } catch {
    return fail(`PDF file not found: ${pdfPath}`);
  }
  if (!stats.isFile()) {
    return fail(`PDF file not found: ${pdfPath}`);
  }

  try {
    await fs.access(pdfPath, fsConstants.R_OK);
  } catch {
    return fail(`PDF file is not readable: ${pdfPath}`);
  }

  if (stats.size > maxFileSize) {
    return fail(`PDF file exceeds maximum size of ${maxFileSize} bytes`);
  }

  if (!pdfPath.toLowerCase().endsWith('.pdf')) {
    return fail('File is not a PDF');
  }

  if (!hasPdfMagic(await readHeader(pdfPath))) {
    return fail('File is not a valid PDF document');
  }

  return { ok: true, source: { kind: 'path', path: pdfPath } };
}

export function resolveContentInput(pdfContent: string, maxFileSize: number): ResolvedInput {
  const encoded = pdfContent.replace(DATA_URI_PREFIX, '').replace(/\s+/g, '');
  if (encoded.length === 0 || encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    return fail('Invalid base64 PDF content');
  }

  const data = new Uint8Array(Buffer.from(encoded, 'base64'));
  if (data.byteLength > maxFileSize) {
    return fail(`PDF content exceeds maximum size of ${maxFileSize} bytes`);
  }

  if (!hasPdfMagic(data)) {
    return fail('Content is not a valid PDF document');
  }

  return { ok: true, source: { kind: 'bytes', data, sourceName: INLINE_SOURCE_NAME } };
}

/**
 * Resolve whichever input the request carries. The body has already passed
 * schema validation, so exactly one of the two is set.
 */
export async function resolveExtractInput(
  request: ExtractRequest,
  maxFileSize: number
): Promise<ResolvedInput> {
  if (request.pdfPath !== undefined) {
    return resolvePathInput(request.pdfPath, maxFileSize);
  }
  if (request.pdfContent !== undefined) {
    return resolveContentInput(request.pdfContent, maxFileSize);
  }
  return fail('Either pdfPath or pdfContent must be provided');
}
