import * as fs from 'fs/promises';
import * as path from 'path';
import { FileSystemIOError, getErrnoCode, toError } from '../errors/index.js';
import type { CollectedFile, SourceFileFacts } from '../types/extraction.types.js';
import { hashBuffer, shortHash } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';

/**
 * Derive the logical document name: base name without extension
 */
export function deriveDocumentName(filePath: string): string {
    return path.parse(filePath).name;
}

/**
 * Gathers size, content hash and modification time of a validated file
 */
export class MetadataCollector {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    /**
     * Read the file once and describe it.
     * The returned buffer is handed to the extractor.
     */
    async collect(filePath: string): Promise<CollectedFile> {
        let buffer: Buffer;
        let stats: { size: number; mtime: Date };

        try {
            [buffer, stats] = await Promise.all([fs.readFile(filePath), fs.stat(filePath)]);
        } catch (error) {
            const cause = toError(error);
            throw new FileSystemIOError(
                `Cannot read file attributes: ${filePath} (${cause.message})`,
                { path: filePath, errno: getErrnoCode(error) },
                { cause, operation: 'collectFileMetadata' }
            );
        }

        const facts: SourceFileFacts = {
            name: deriveDocumentName(filePath),
            fileName: path.basename(filePath),
            filePath: path.resolve(filePath),
            fileSize: stats.size,
            fileHash: hashBuffer(buffer),
            modifiedTime: stats.mtime.toISOString(),
        };

        this.logger.debug('File metadata collected', {
            file: facts.fileName,
            fileSize: facts.fileSize,
            hash: shortHash(facts.fileHash),
        });

        return { buffer, facts };
    }
}
