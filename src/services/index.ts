export { FileValidator } from './file.validator.js';
export { MetadataCollector, deriveDocumentName } from './metadata.collector.js';
export { PageTextExtractor, type PageExtractionResult } from './page-text.extractor.js';
export { PdfParseReader } from './pdf-parse.reader.js';
export { assembleExtractionResult, buildFullText, toPageRecords } from './json.assembler.js';
export { OutputWriter, resolveOutputPath, serializeExtractionResult } from './output.writer.js';
