import * as fs from 'fs/promises';
import * as path from 'path';
import { JSON_INDENT, OUTPUT_EXTENSION } from '../config/constants.js';
import { FileSystemIOError, WriteError, getErrnoCode, toError } from '../errors/index.js';
import type { ExtractionResult } from '../types/extraction.types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Resolve where the artifact goes.
 * Without an explicit path: the input's directory, its base name, `.json`.
 */
export function resolveOutputPath(pdfFilePath: string, outputFilePath?: string): string {
    if (outputFilePath && outputFilePath.trim()) {
        return outputFilePath;
    }

    const { dir, name } = path.parse(pdfFilePath);
    return path.join(dir || '.', `${name}${OUTPUT_EXTENSION}`);
}

export function serializeExtractionResult(result: ExtractionResult): string {
    return JSON.stringify(result, null, JSON_INDENT);
}

/**
 * Writes the artifact, creating parent directories as needed.
 * A partially written file is left in place on failure.
 */
export class OutputWriter {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    async write(result: ExtractionResult, outputFilePath: string): Promise<void> {
        const directory = path.dirname(outputFilePath);

        try {
            await fs.mkdir(directory, { recursive: true });
        } catch (error) {
            const cause = toError(error);
            throw new FileSystemIOError(
                `Cannot create output directory ${directory}: ${cause.message}`,
                { path: directory, errno: getErrnoCode(error) },
                { cause, operation: 'createOutputDirectory' }
            );
        }

        let payload: string;
        try {
            payload = serializeExtractionResult(result);
        } catch (error) {
            const cause = toError(error);
            throw new WriteError(`Cannot serialize result: ${cause.message}`, outputFilePath, undefined, {
                cause,
                operation: 'serialize',
            });
        }

        try {
            await fs.writeFile(outputFilePath, payload, 'utf-8');
        } catch (error) {
            const cause = toError(error);
            throw new WriteError(
                `Cannot write ${outputFilePath}: ${cause.message}`,
                outputFilePath,
                { errno: getErrnoCode(error) },
                { cause, operation: 'writeFile' }
            );
        }

        this.logger.info('Output written', { file: outputFilePath, bytes: Buffer.byteLength(payload, 'utf-8') });
    }
}
