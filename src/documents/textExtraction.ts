// src/documents/textExtraction.ts
// Plain text from uploaded contracts: .pdf (unpdf), .docx (mammoth), .txt.
//
// Only the extension decides the kind. Unsupported extensions throw
// UnsupportedDocumentError; a supported file that fails to parse yields null.

import path from 'path';
import mammoth from 'mammoth';
import { createLogger } from '../observability/logger';
import { recordDocumentExtraction } from '../observability/metrics';

const log = createLogger('documents/extract');

export type DocumentKind = 'pdf' | 'docx' | 'txt';

const KIND_BY_EXTENSION: Readonly<Record<string, DocumentKind>> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'txt',
};

export const SUPPORTED_EXTENSIONS = Object.keys(KIND_BY_EXTENSION);

export class UnsupportedDocumentError extends Error {
  readonly filename: string;

  constructor(filename: string) {
    super(`Unsupported file type: ${filename || '(no name)'}. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`);
    this.name = 'UnsupportedDocumentError';
    this.filename = filename;
  }
}

export function detectDocumentKind(filename: string): DocumentKind | null {
  return KIND_BY_EXTENSION[path.extname(filename).toLowerCase()] ?? null;
}

/* ============= Per-kind readers ============= */

async function readPdf(buffer: Buffer): Promise<string> {
  // Loaded on demand; the PDF.js build is large
  const { extractText, getDocumentProxy } = await import('unpdf');
  const pdf = await getDocumentProxy(new Uint8Array(buffer));
  try {
    const { text } = await extractText(pdf, { mergePages: true });
    return Array.isArray(text) ? text.join('\n') : text;
  } finally {
    await pdf.destroy();
  }
}

async function readDocx(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  if (result.messages.length > 0) {
    log.debug({ warnings: result.messages.length }, 'mammoth reported warnings');
  }
  return result.value;
}

function readTxt(buffer: Buffer): string {
  // Drop a UTF-8 byte order mark
  return buffer.toString('utf-8').replace(/^\uFEFF/, '');
}

/* ============= Entry Point ============= */

export interface UploadedDocument {
  filename: string;
  buffer: Buffer;
}

/**
 * Extract trimmed text from an uploaded document.
 * Returns null when the file cannot be parsed or contains no text.
 *
 * @throws UnsupportedDocumentError for extensions other than .pdf, .docx, .txt
 */
export async function extractText(doc: UploadedDocument): Promise<string | null> {
  const kind = detectDocumentKind(doc.filename);
  if (!kind) throw new UnsupportedDocumentError(doc.filename);

  let text: string;
  try {
    if (kind === 'pdf') text = await readPdf(doc.buffer);
    else if (kind === 'docx') text = await readDocx(doc.buffer);
    else text = readTxt(doc.buffer);
  } catch (err) {
    log.warn({ err, kind, filename: doc.filename, bytes: doc.buffer.length }, 'Text extraction failed');
    recordDocumentExtraction(kind, 'error');
    return null;
  }

  const trimmed = text.trim();
  recordDocumentExtraction(kind, trimmed ? 'success' : 'error');
  return trimmed || null;
}
