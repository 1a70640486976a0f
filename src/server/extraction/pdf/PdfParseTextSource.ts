/**
 * PdfParseTextSource - per-page text extraction with pdf-parse
 *
 * pdf-parse only returns the whole document's text, so a page renderer collects
 * each page's text items separately while the library walks the pages.
 */

import { createRequire } from 'module';
import type PdfParse from 'pdf-parse';
import type { PdfTextSource } from '../../contracts/capabilities.js';
import { logger } from '../../utils/logger.js';

// Loaded through require: importing the package entry point from ESM switches it into its debug mode
const require = createRequire(import.meta.url);
const pdfParse: typeof PdfParse = require('pdf-parse');

interface TextItem {
  str: string;
  /** Affine transform; index 5 is the baseline y coordinate */
  transform: number[];
}

interface PdfPage {
  pageNumber: number;
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<{
    items: TextItem[];
  }>;
}

export interface ExtractedPage {
  pageNumber: number;
  text: string;
}

/**
 * Join text items, starting a new line whenever the baseline changes
 */
export function joinTextItems(items: TextItem[]): string {
  let text = '';
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

export class PdfParseTextSource implements PdfTextSource {
  async extractPages(pdf: Buffer): Promise<ExtractedPage[]> {
    const pending: Array<Promise<ExtractedPage>> = [];

    const renderPage = (page: PdfPage): string => {
      pending.push(
        page
          .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
          .then((content) => ({ pageNumber: page.pageNumber, text: joinTextItems(content.items) }))
      );
      return '';
    };

    try {
      const data = await pdfParse(pdf, { max: 0, pagerender: renderPage });
      const pages = await Promise.all(pending);
      pages.sort((a, b) => a.pageNumber - b.pageNumber);
      logger.debug({ pageCount: data.numpages, extracted: pages.length }, 'Extracted PDF pages');
      return pages;
    } catch (error) {
      await Promise.allSettled(pending);
      throw error;
    }
  }
}
