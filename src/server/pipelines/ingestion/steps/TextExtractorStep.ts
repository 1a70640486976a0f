import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import { isArrayOf, isPageContent } from '../guards.js';
import type { PageContent } from '../types.js';
import type { LoadedDocument } from './PdfLoaderStep.js';

/**
 * Step 2: clean page text and drop pages without text
 */
export class TextExtractorStep extends PipelineStep<LoadedDocument, PageContent[]> {
  constructor() {
    super('Text Extractor');
  }

  validateInput(input: unknown): input is LoadedDocument {
    return (
      typeof input === 'object' &&
      input !== null &&
      'pages' in input &&
      isArrayOf(input.pages, isPageContent)
    );
  }

  process(input: LoadedDocument, context: PipelineContext): PageContent[] {
    const pages: PageContent[] = [];
    let totalChars = 0;

    for (const page of input.pages) {
      const text = cleanText(page.text);
      if (text) {
        pages.push({ pageNumber: page.pageNumber, text });
        totalChars += text.length;
      }
    }

    context.totalChars = totalChars;
    context.pagesWithText = pages.length;
    this.logger.info({ pages: pages.length, totalChars }, 'Extracted page text');
    return pages;
  }

  getDataSize(data: unknown): number | undefined {
    if (typeof data === 'object' && data !== null && 'pageCount' in data && typeof data.pageCount === 'number') {
      return data.pageCount;
    }
    return super.getDataSize(data);
  }
}

/**
 * Trim every line and collapse runs of blank lines into one, so paragraph
 * breaks (`\n\n`) survive for the chunk builder
 */
export function cleanText(text: string): string {
  const lines: string[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line || (lines.length > 0 && lines[lines.length - 1] !== '')) {
      lines.push(line);
    }
  }
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.join('\n');
}
