export { PDF_TEXT_EXTRACTOR } from './config/constants';
export { InputUnavailableError } from './errors';
export {
  PdfTextExtractor,
  type PdfTextExtractorOptions,
} from './processors/pdf-text-extractor';
