import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('mupdf', () => ({
  Document: {
    openDocument: vi.fn(),
  },
}));

vi.mock('mammoth', () => ({
  default: {
    extractRawText: vi.fn(),
  },
}));

// Import mocks AFTER vi.mock calls
import mammoth from 'mammoth';
import * as mupdf from 'mupdf';
import {
  TextExtractor,
  formatFromFilename,
  normalizeWhitespace,
} from './extraction';

const encode = (text: string) => new TextEncoder().encode(text);

function fakePage(text: string) {
  return {
    toStructuredText: vi.fn().mockReturnValue({ asText: () => text }),
    destroy: vi.fn(),
  };
}

describe('normalizeWhitespace', () => {
  it('collapses blank-line runs and strips trailing spaces', () => {
    expect(normalizeWhitespace('Line one  \r\n\r\n\r\n\r\nLine two\fLine three\n\n\n')).toBe(
      'Line one\n\nLine two\nLine three'
    );
  });

  it('treats whitespace-only lines as blank', () => {
    expect(normalizeWhitespace('a\n   \n\n  \nb')).toBe('a\n\nb');
  });

  it('keeps single blank lines between paragraphs', () => {
    expect(normalizeWhitespace('p1\n\np2')).toBe('p1\n\np2');
  });
});

describe('formatFromFilename', () => {
  it.each([
    ['notes.txt', 'text'],
    ['README.md', 'markdown'],
    ['Thermo.PDF', 'pdf'],
    ['lecture.docx', 'docx'],
  ])('maps %s to %s', (filename, format) => {
    expect(formatFromFilename(filename)).toBe(format);
  });

  it('rejects unknown extensions', () => {
    expect(() => formatFromFilename('slides.pptx')).toThrow('Unsupported document format: pptx');
  });
});

describe('TextExtractor', () => {
  const extractor = new TextExtractor();

  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('decodes UTF-8 text and normalizes it', async () => {
    const text = await extractor.extract({
      format: 'text',
      payload: encode('Énergie cinétique\n\n\n\nE = ½mv²  \n'),
    });
    expect(text).toBe('Énergie cinétique\n\nE = ½mv²');
  });

  it('treats markdown as text', async () => {
    await expect(extractor.extract({ format: 'markdown', payload: encode('# Title\n\n\n\nBody') })).resolves.toBe(
      '# Title\n\nBody'
    );
  });

  it('rejects invalid UTF-8 as a corrupt document', async () => {
    await expect(
      extractor.extract({ format: 'text', payload: new Uint8Array([0x48, 0xff, 0xfe, 0x49]) })
    ).rejects.toMatchObject({ code: 'CORRUPT_DOCUMENT' });
  });

  it('rejects text containing NUL bytes', async () => {
    await expect(
      extractor.extract({ format: 'text', payload: new Uint8Array([0x41, 0x00, 0x42]) })
    ).rejects.toMatchObject({ code: 'CORRUPT_DOCUMENT', details: { reason: 'payload contains binary data' } });
  });

  it('rejects unknown format tags', async () => {
    await expect(extractor.extract({ format: 'pptx', payload: encode('x') })).rejects.toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
      details: { format: 'pptx' },
    });
  });

  it('rejects formats with no registered extractor', async () => {
    const textOnly = new TextExtractor([]);
    await expect(textOnly.extract({ format: 'text', payload: encode('x') })).rejects.toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
    });
  });

  describe('pdf', () => {
    it('joins page texts and releases MuPDF objects', async () => {
      const pages = [fakePage('Page one text\n\n\n\n'), fakePage('Page two')];
      const doc = {
        countPages: vi.fn().mockReturnValue(2),
        loadPage: vi.fn((index: number) => pages[index]),
        destroy: vi.fn(),
      };
      vi.mocked(mupdf.Document.openDocument).mockReturnValue(doc as unknown as mupdf.Document);

      const text = await extractor.extract({ format: 'pdf', payload: encode('%PDF-1.7 body') });

      expect(text).toBe('Page one text\n\nPage two');
      expect(pages[0].destroy).toHaveBeenCalledTimes(1);
      expect(pages[1].destroy).toHaveBeenCalledTimes(1);
      expect(doc.destroy).toHaveBeenCalledTimes(1);
    });

    it('rejects payloads without a PDF header', async () => {
      await expect(extractor.extract({ format: 'pdf', payload: encode('hello') })).rejects.toMatchObject({
        code: 'CORRUPT_DOCUMENT',
        details: { format: 'pdf', reason: 'missing %PDF- header' },
      });
      expect(mupdf.Document.openDocument).not.toHaveBeenCalled();
    });

    it('maps parser failures to CORRUPT_DOCUMENT', async () => {
      vi.mocked(mupdf.Document.openDocument).mockImplementation(() => {
        throw new Error('cannot find startxref');
      });

      await expect(extractor.extract({ format: 'pdf', payload: encode('%PDF-1.4 broken') })).rejects.toMatchObject({
        code: 'CORRUPT_DOCUMENT',
        message: 'Corrupt pdf document: cannot find startxref',
      });
    });
  });

  describe('docx', () => {
    const zipHeader = new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]);

    it('extracts raw text with mammoth', async () => {
      vi.mocked(mammoth.extractRawText).mockResolvedValue({ value: 'Heading\n\n\n\nParagraph', messages: [] });

      await expect(extractor.extract({ format: 'docx', payload: zipHeader })).resolves.toBe('Heading\n\nParagraph');
      expect(mammoth.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from(zipHeader) });
    });

    it('rejects payloads that are not ZIP containers', async () => {
      await expect(extractor.extract({ format: 'docx', payload: encode('plain') })).rejects.toMatchObject({
        code: 'CORRUPT_DOCUMENT',
        details: { format: 'docx', reason: 'not a ZIP container' },
      });
    });

    it('maps mammoth failures to CORRUPT_DOCUMENT', async () => {
      vi.mocked(mammoth.extractRawText).mockRejectedValue(new Error('Could not find main document part'));

      await expect(extractor.extract({ format: 'docx', payload: zipHeader })).rejects.toMatchObject({
        code: 'CORRUPT_DOCUMENT',
        message: 'Corrupt docx document: Could not find main document part',
      });
    });
  });
});
