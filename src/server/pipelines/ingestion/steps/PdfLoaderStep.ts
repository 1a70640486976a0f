import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import type { PdfTextSource } from '../../../contracts/capabilities.js';
import type { PageContent } from '../types.js';

/** Anything smaller cannot be a PDF with content */
export const MIN_PDF_BYTES = 100;

export interface LoadedDocument {
  pageCount: number;
  pages: PageContent[];
}

/**
 * Step 1: read the PDF bytes into per-page raw text
 */
export class PdfLoaderStep extends PipelineStep<Buffer, LoadedDocument> {
  constructor(private readonly source: PdfTextSource) {
    super('PDF Loader');
  }

  validateInput(input: unknown): input is Buffer {
    if (!Buffer.isBuffer(input)) {
      this.logger.error('Input must be a Buffer');
      return false;
    }
    if (input.length < MIN_PDF_BYTES) {
      this.logger.error({ bytes: input.length }, 'PDF content too small');
      return false;
    }
    return true;
  }

  async process(input: Buffer, context: PipelineContext): Promise<LoadedDocument> {
    this.logger.info({ bytes: input.length }, 'Loading PDF');
    const pages = await this.source.extractPages(input);
    context.pageCount = pages.length;
    this.logger.info({ pageCount: pages.length }, 'Loaded PDF');
    return { pageCount: pages.length, pages };
  }

  getDataSize(data: unknown): number | undefined {
    if (Buffer.isBuffer(data)) {
      return data.length;
    }
    return super.getDataSize(data);
  }
}
