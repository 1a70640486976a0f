import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import type { ArticleSegmenter } from '../../../chunking/ArticleSegmenter.js';
import { isArrayOf, isPageContent } from '../guards.js';
import type { PageContent, RawArticle } from '../types.js';

/**
 * Step 3: split page text at article headers
 */
export class ArticleSplitterStep extends PipelineStep<PageContent[], RawArticle[]> {
  constructor(private readonly segmenter: ArticleSegmenter) {
    super('Article Splitter');
  }

  validateInput(input: unknown): input is PageContent[] {
    return isArrayOf(input, isPageContent);
  }

  process(input: PageContent[], context: PipelineContext): RawArticle[] {
    const articles = this.segmenter.segment(input);
    context.articlesFound = articles.length;
    this.logger.info(
      { articles: articles.length, firstNumbers: articles.slice(0, 10).map((a) => a.articleNumber) },
      'Split text into articles'
    );
    return articles;
  }

  describeOutput(output: RawArticle[]): Record<string, unknown> {
    const hasPreamble = output.length > 0 && output[0].articleNumber === 0;
    return { hasPreamble };
  }
}
