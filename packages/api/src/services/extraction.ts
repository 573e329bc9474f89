import mammoth from 'mammoth';
import * as mupdf from 'mupdf';
import { DOCUMENT_FORMATS } from '@eduflow/shared';
import type { Document, DocumentFormat } from '@eduflow/shared';
import { CorruptDocumentError, UnsupportedFormatError } from '../errors';

/**
 * Text Extraction Service
 *
 * Turns an uploaded document into a flat UTF-8 text stream.
 *
 * Formats:
 * - text / markdown: strict UTF-8 decode (invalid bytes or NULs are corrupt)
 * - pdf: page text via MuPDF
 * - docx: raw paragraph text via mammoth
 *
 * Every extractor's output goes through normalizeWhitespace so PDF and DOCX
 * layout artifacts do not leak into chunk boundaries.
 */

export interface FormatExtractor {
  readonly formats: readonly DocumentFormat[];
  extract(payload: Uint8Array): Promise<string>;
}

const PDF_MAGIC = '%PDF-';
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];

export function isDocumentFormat(value: string): value is DocumentFormat {
  return (DOCUMENT_FORMATS as readonly string[]).includes(value);
}

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  txt: 'text',
  text: 'text',
  md: 'markdown',
  markdown: 'markdown',
  pdf: 'pdf',
  docx: 'docx',
};

/**
 * Resolve a format tag from an upload's file name.
 */
export function formatFromFilename(filename: string): DocumentFormat {
  const dot = filename.lastIndexOf('.');
  const extension = dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
  const format = EXTENSION_FORMATS[extension];
  if (!format) {
    throw new UnsupportedFormatError(extension || filename);
  }
  return format;
}

/**
 * Collapse extraction artifacts: CRLF and form feeds become LF, trailing
 * spaces are cut, and any run of blank lines becomes a single blank line.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\f/g, '\n')
    .replace(/[ \t\u00a0]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class PlainTextExtractor implements FormatExtractor {
  readonly formats = ['text', 'markdown'] as const;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  async extract(payload: Uint8Array): Promise<string> {
    let text: string;
    try {
      text = this.decoder.decode(payload);
    } catch (error) {
      throw new CorruptDocumentError('text', 'payload is not valid UTF-8', error);
    }
    if (text.includes('\u0000')) {
      throw new CorruptDocumentError('text', 'payload contains binary data');
    }
    return text;
  }
}

export class PdfExtractor implements FormatExtractor {
  readonly formats = ['pdf'] as const;

  async extract(payload: Uint8Array): Promise<string> {
    const header = new TextDecoder('latin1').decode(payload.subarray(0, PDF_MAGIC.length));
    if (header !== PDF_MAGIC) {
      throw new CorruptDocumentError('pdf', 'missing %PDF- header');
    }

    let doc: mupdf.Document | undefined;
    try {
      doc = mupdf.Document.openDocument(payload, 'application/pdf');
      const pageTexts: string[] = [];
      const pageCount = doc.countPages();

      for (let i = 0; i < pageCount; i++) {
        const page = doc.loadPage(i);
        try {
          pageTexts.push(page.toStructuredText('preserve-whitespace').asText());
        } finally {
          page.destroy();
        }
      }
      return pageTexts.join('\n\n');
    } catch (error) {
      throw new CorruptDocumentError('pdf', error instanceof Error ? error.message : 'unreadable PDF', error);
    } finally {
      doc?.destroy();
    }
  }
}

export class DocxExtractor implements FormatExtractor {
  readonly formats = ['docx'] as const;

  async extract(payload: Uint8Array): Promise<string> {
    if (!ZIP_MAGIC.every((byte, i) => payload[i] === byte)) {
      throw new CorruptDocumentError('docx', 'not a ZIP container');
    }

    try {
      const result = await mammoth.extractRawText({ buffer: Buffer.from(payload) });
      return result.value;
    } catch (error) {
      throw new CorruptDocumentError('docx', error instanceof Error ? error.message : 'unreadable DOCX', error);
    }
  }
}

export class TextExtractor {
  private readonly byFormat = new Map<DocumentFormat, FormatExtractor>();

  constructor(
    extractors: readonly FormatExtractor[] = [
      new PlainTextExtractor(),
      new PdfExtractor(),
      new DocxExtractor(),
    ]
  ) {
    for (const extractor of extractors) {
      for (const format of extractor.formats) {
        this.byFormat.set(format, extractor);
      }
    }
  }

  supports(format: string): format is DocumentFormat {
    return isDocumentFormat(format) && this.byFormat.has(format);
  }

  async extract(document: { format: string; payload: Document['payload'] }): Promise<string> {
    const extractor = this.supports(document.format) ? this.byFormat.get(document.format) : undefined;
    if (!extractor) {
      throw new UnsupportedFormatError(document.format);
    }

    const raw = await extractor.extract(document.payload);
    return normalizeWhitespace(raw);
  }
}
