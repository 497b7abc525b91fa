export { createLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export { hashBuffer, shortHash, HASH_ALGORITHM } from './hash.js';

export { countCharacters, hasExtractableText } from './text.js';

export { PdfConverterEventEmitter, createEventEmitter } from './events.js';
export type { PdfConverterEvents } from './events.js';
