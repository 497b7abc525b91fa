import { constants as fsConstants } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Stats } from 'fs';
import { PDF_SIGNATURE } from '../config/constants.js';
import { InvalidInputError, getErrnoCode, toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Checks that an input path points at a readable file carrying a PDF signature.
 * Whether the container actually opens is checked by the converter through the
 * reader; page-level validity is left to the extractor.
 */
export class FileValidator {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    async validate(filePath: string): Promise<void> {
        this.logger.debug('Validating input', { file: filePath });

        if (!filePath || !filePath.trim()) {
            throw new InvalidInputError('PDF file path is required', filePath);
        }

        const stats = await this.stat(filePath);

        if (!stats.isFile()) {
            throw new InvalidInputError(`PDF path is not a file: ${filePath}`, filePath);
        }

        if (stats.size === 0) {
            throw new InvalidInputError(`PDF file is empty: ${filePath}`, filePath, { size: 0 });
        }

        try {
            await fs.access(filePath, fsConstants.R_OK);
        } catch (error) {
            throw this.unreadable(filePath, error);
        }

        const head = await this.readHead(filePath);
        if (!head.includes(PDF_SIGNATURE.MAGIC)) {
            throw new InvalidInputError(
                `File is not a PDF (missing ${PDF_SIGNATURE.MAGIC} header): ${filePath}`,
                filePath
            );
        }

        this.logger.debug('Input validated', { file: filePath, size: stats.size });
    }

    /**
     * Reject an output path that would overwrite the input
     */
    validateOutputPath(pdfFilePath: string, outputFilePath: string): void {
        if (path.resolve(outputFilePath) === path.resolve(pdfFilePath)) {
            throw new InvalidInputError(
                `Output path would overwrite the input PDF: ${outputFilePath}`,
                outputFilePath,
                { pdfFilePath }
            );
        }
    }

    private async stat(filePath: string): Promise<Stats> {
        try {
            return await fs.stat(filePath);
        } catch (error) {
            if (getErrnoCode(error) === 'ENOENT' || getErrnoCode(error) === 'ENOTDIR') {
                throw new InvalidInputError(`PDF file does not exist: ${filePath}`, filePath, undefined, {
                    cause: toError(error),
                });
            }
            throw this.unreadable(filePath, error);
        }
    }

    private async readHead(filePath: string): Promise<string> {
        const head = Buffer.alloc(PDF_SIGNATURE.SEARCH_WINDOW_BYTES);

        try {
            const handle = await fs.open(filePath, 'r');
            try {
                const { bytesRead } = await handle.read(head, 0, head.length, 0);
                return head.subarray(0, bytesRead).toString('latin1');
            } finally {
                await handle.close();
            }
        } catch (error) {
            throw this.unreadable(filePath, error);
        }
    }

    private unreadable(filePath: string, error: unknown): InvalidInputError {
        const cause = toError(error);
        return new InvalidInputError(
            `PDF file is not readable: ${filePath} (${cause.message})`,
            filePath,
            { errno: getErrnoCode(error) },
            { cause }
        );
    }
}
