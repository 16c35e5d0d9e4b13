export type { TextProvider } from './types';
export { isHeading, segmentSections, sectionToChunk, composeFullText } from './sections';
export {
  PdfTextProvider,
  groupIntoLines,
  documentIdFromPath,
  type PdfDocumentHandle,
  type PdfOpener,
  type PdfPageHandle,
  type PdfTextProviderOptions,
  type PositionedText,
} from './pdf-text-provider';
export { CachedTextProvider, isDocumentText } from './cached-text-provider';
export { listPdfFiles } from './files';
