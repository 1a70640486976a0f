export { PdfLoaderStep, MIN_PDF_BYTES, type LoadedDocument } from './PdfLoaderStep.js';
export { TextExtractorStep, cleanText } from './TextExtractorStep.js';
export { ArticleSplitterStep } from './ArticleSplitterStep.js';
export { MetadataEnricherStep } from './MetadataEnricherStep.js';
export { DenseEmbedderStep } from './DenseEmbedderStep.js';
export { SparseEncoderStep } from './SparseEncoderStep.js';
export { VectorStorerStep, type StoreSummary } from './VectorStorerStep.js';
