import { describe, it, expect } from 'vitest';
import {
  detectDocumentKind,
  extractText,
  UnsupportedDocumentError,
} from '../textExtraction.js';

describe('detectDocumentKind', () => {
  it('maps extensions case-insensitively', () => {
    expect(detectDocumentKind('contract.PDF')).toBe('pdf');
    expect(detectDocumentKind('offer-letter.docx')).toBe('docx');
    expect(detectDocumentKind('notes.txt')).toBe('txt');
  });

  it('rejects other extensions', () => {
    expect(detectDocumentKind('legacy.doc')).toBeNull();
    expect(detectDocumentKind('README')).toBeNull();
  });
});

describe('extractText', () => {
  it('reads UTF-8 text files and trims them', async () => {
    const buffer = Buffer.from('\uFEFF  सेवा समझौता\nService Agreement  \n', 'utf-8');
    await expect(extractText({ filename: 'a.txt', buffer })).resolves.toBe('सेवा समझौता\nService Agreement');
  });

  it('returns null for a blank text file', async () => {
    await expect(extractText({ filename: 'blank.txt', buffer: Buffer.from(' \n\t ') })).resolves.toBeNull();
  });

  it('throws for unsupported extensions', async () => {
    await expect(extractText({ filename: 'scan.png', buffer: Buffer.from('x') })).rejects.toBeInstanceOf(
      UnsupportedDocumentError
    );
  });

  it('returns null for a corrupt docx', async () => {
    await expect(
      extractText({ filename: 'broken.docx', buffer: Buffer.from('not a zip archive') })
    ).resolves.toBeNull();
  });

  it('returns null for a corrupt pdf', async () => {
    await expect(
      extractText({ filename: 'broken.pdf', buffer: Buffer.from('not a pdf either') })
    ).resolves.toBeNull();
  });
});
