import pdf from 'pdf-parse';
import { readFile } from 'fs/promises';
import { DocumentLoadError } from '../errors';

// pdf-parse starts every page's text with this separator
const PAGE_SEPARATOR = '\n\n';

export interface DocumentLoader {
  load(documentPath: string): Promise<string[]>;
}

export class PdfDocumentLoader implements DocumentLoader {
  /**
   * Load a PDF from disk and return its text, one entry per page
   */
  async load(documentPath: string): Promise<string[]> {
    let buffer: Buffer;
    try {
      buffer = await readFile(documentPath);
    } catch (error) {
      throw new DocumentLoadError(`Failed to read ${documentPath}`, error instanceof Error ? error.message : undefined);
    }

    let data: pdf.Result;
    try {
      data = await pdf(buffer);
    } catch (error) {
      throw new DocumentLoadError('Failed to parse PDF', error instanceof Error ? error.message : 'Unknown error');
    }

    return PdfDocumentLoader.splitPages(data.text, data.numpages).map(page => PdfDocumentLoader.cleanText(page));
  }

  /**
   * Split pdf-parse output back into pages. Falls back to a single section
   * when the separators do not line up with the page count.
   */
  static splitPages(text: string, pageCount: number): string[] {
    const body = text.startsWith(PAGE_SEPARATOR) ? text.substring(PAGE_SEPARATOR.length) : text;
    const pages = body.split(PAGE_SEPARATOR);
    if (pages.length !== pageCount) {
      console.warn(`PDF page split mismatch: expected ${pageCount} pages, found ${pages.length}`);
      return [body];
    }
    return pages;
  }

  /**
   * Normalize line endings and strip PDF artifacts from a page
   */
  static cleanText(text: string): string {
    return text
      .replace(/\f/g, '\n') // Form feed characters
      .replace(/\r\n/g, '\n')
      .replace(/\r/g, '\n')
      .replace(/^[ \t]*Page \d+ of \d+[ \t]*$/gim, '')
      .replace(/[ \t]+/g, ' ')
      .replace(/\n\s*\n\s*\n/g, '\n\n')
      .trim();
  }
}
