import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
    EXIT_CONFIG_ERROR,
    EXIT_FAILURE,
    EXIT_SUCCESS,
    buildConvertConfig,
    runCli,
    type CliIO,
} from '../../src/bin/program.js';
import { createPdfConverter } from '../../src/pdf-converter.factory.js';
import type { PdfConverterConfig } from '../../src/types/config.types.js';
import {
    createMockLogger,
    createMockPdfReader,
    createTempDir,
    pathExists,
    removeTempDir,
    writeFixture,
    type FakePage,
} from '../mocks/index.js';

interface TestIO extends CliIO {
    out: string[];
    err: string[];
    configs: PdfConverterConfig[];
}

function createTestIO(pages: FakePage[] = ['Hello', 'World!'], env: NodeJS.ProcessEnv = {}): TestIO {
    const out: string[] = [];
    const err: string[] = [];
    const configs: PdfConverterConfig[] = [];

    return {
        out,
        err,
        configs,
        env,
        stdout: (line) => out.push(line),
        stderr: (line) => err.push(line),
        createConverter: (config) => {
            configs.push(config);
            return createPdfConverter({
                ...config,
                pdfReader: createMockPdfReader(pages),
                logger: createMockLogger(),
            });
        },
    };
}

const argv = (...args: string[]): string[] => ['node', 'pdf-json-extract', ...args];

describe('CLI', () => {
    let dir: string;
    let pdfFilePath: string;

    beforeEach(async () => {
        dir = await createTempDir();
        pdfFilePath = await writeFixture(dir, 'report.pdf');
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    describe('convert', () => {
        it('should convert and print a summary', async () => {
            const io = createTestIO();

            const code = await runCli(argv('convert', pdfFilePath), io);

            const outputFilePath = path.join(dir, 'report.json');
            expect(code).toBe(EXIT_SUCCESS);
            expect(io.err).toEqual([]);
            expect(io.out.slice(0, 2)).toEqual(['Extracting page 1/2 (5 chars)', 'Extracting page 2/2 (6 chars)']);
            expect(io.out.slice(2, 8)).toEqual([
                'PDF to JSON conversion completed successfully!',
                'PDF File: report.pdf',
                'Total Pages: 2',
                'Pages With Text: 2',
                'Total Characters: 11',
                `Output saved to: ${outputFilePath}`,
            ]);
            expect(io.out[8]).toBe('Data Type: from_pdf');
            expect(io.out[9].startsWith('Timestamp: ')).toBe(true);
            expect(await pathExists(outputFilePath)).toBe(true);
        });

        it('should label empty and failed pages in progress lines', async () => {
            const io = createTestIO(['', new Error('broken')]);

            await runCli(argv('convert', pdfFilePath), io);

            expect(io.out.slice(0, 2)).toEqual(['Extracting page 1/2 (empty)', 'Extracting page 2/2 (failed)']);
        });

        it('should honour --output and --no-page-numbers', async () => {
            const io = createTestIO(['a', 'b']);
            const target = path.join(dir, 'out', 'custom.json');

            const code = await runCli(argv('convert', pdfFilePath, '-o', target, '--no-page-numbers'), io);

            expect(code).toBe(EXIT_SUCCESS);
            const written: unknown = JSON.parse(await fs.readFile(target, 'utf-8'));
            expect(written).toMatchObject({ content: { full_text: 'a\n\nb' } });
        });

        it('should fall back to environment variables', async () => {
            const target = path.join(dir, 'from-env.json');
            const io = createTestIO(['a', 'b'], {
                PDF_FILE_PATH: pdfFilePath,
                OUTPUT_FILE_PATH: target,
                INCLUDE_PAGE_NUMBERS: 'false',
            });

            const code = await runCli(argv('convert'), io);

            expect(code).toBe(EXIT_SUCCESS);
            expect(io.configs[0]).toMatchObject({
                pdfFilePath,
                outputFilePath: target,
                includePageNumbers: false,
            });
            expect(await pathExists(target)).toBe(true);
        });

        it('should load variables from --env-file without overriding set ones', async () => {
            const envFile = await writeFixture(
                dir,
                '.env.test',
                `PDF_FILE_PATH=${pdfFilePath}\nLOG_LEVEL=debug\nINCLUDE_PAGE_NUMBERS=no\n`
            );
            const io = createTestIO(['a'], { LOG_LEVEL: 'warn' });

            const code = await runCli(argv('convert', '--env-file', envFile), io);

            expect(code).toBe(EXIT_SUCCESS);
            expect(io.env.PDF_FILE_PATH).toBe(pdfFilePath);
            expect(io.configs[0]).toMatchObject({
                pdfFilePath,
                includePageNumbers: false,
                logging: { level: 'warn', structured: false },
            });
        });

        it('should exit with 1 when the input is missing', async () => {
            const missing = path.join(dir, 'missing.pdf');
            const io = createTestIO();

            const code = await runCli(argv('convert', missing), io);

            expect(code).toBe(EXIT_FAILURE);
            expect(io.err).toEqual([
                `Conversion failed during validating stage [INVALID_INPUT]: PDF file does not exist: ${missing}`,
                `Input: ${missing}`,
            ]);
            expect(await pathExists(path.join(dir, 'missing.json'))).toBe(false);
        });

        it('should exit with 1 when no input is given at all', async () => {
            const io = createTestIO();

            const code = await runCli(argv('convert'), io);

            expect(code).toBe(EXIT_FAILURE);
            expect(io.err).toEqual([
                'Conversion failed during validating stage [INVALID_INPUT]: PDF file path is required',
                'Input: (none)',
            ]);
        });

        it('should exit with 2 on invalid environment', async () => {
            const io = createTestIO(['a'], { INCLUDE_PAGE_NUMBERS: 'maybe' });

            const code = await runCli(argv('convert', pdfFilePath), io);

            expect(code).toBe(EXIT_CONFIG_ERROR);
            expect(io.err).toHaveLength(1);
            expect(io.err[0].startsWith('Configuration error: Environment validation failed:')).toBe(true);
            expect(io.configs).toEqual([]);
        });

        it('should exit with 2 when the env file cannot be read', async () => {
            const envFile = path.join(dir, 'absent.env');
            const io = createTestIO();

            const code = await runCli(argv('convert', pdfFilePath, '--env-file', envFile), io);

            expect(code).toBe(EXIT_CONFIG_ERROR);
            expect(io.err[0].startsWith(`Configuration error: Cannot load env file ${envFile}: `)).toBe(true);
        });
    });

    describe('default command', () => {
        it('should convert from PDF_FILE_PATH when invoked bare', async () => {
            const io = createTestIO(['Hello'], { PDF_FILE_PATH: pdfFilePath });

            const code = await runCli(argv(), io);

            expect(code).toBe(EXIT_SUCCESS);
            expect(io.err).toEqual([]);
            expect(io.out).toContain('PDF to JSON conversion completed successfully!');
            expect(io.out).toContain(`Output saved to: ${path.join(dir, 'report.json')}`);
            expect(await pathExists(path.join(dir, 'report.json'))).toBe(true);
        });

        it('should treat a bare path as the convert argument', async () => {
            const io = createTestIO(['Hello']);

            const code = await runCli(argv(pdfFilePath), io);

            expect(code).toBe(EXIT_SUCCESS);
            expect(io.configs[0]).toMatchObject({ pdfFilePath });
            expect(io.out).toContain('Total Characters: 5');
        });

        it('should exit with 2 on a usage error', async () => {
            const io = createTestIO();

            const code = await runCli(argv('convert', pdfFilePath, '--log-level', 'loud'), io);

            expect(code).toBe(EXIT_CONFIG_ERROR);
            expect(io.err).toHaveLength(1);
            expect(io.err[0].startsWith("error: option '--log-level <level>' argument 'loud' is invalid.")).toBe(true);
            expect(io.configs).toEqual([]);
        });

        it('should exit with 2 on an unknown option', async () => {
            const io = createTestIO();

            const code = await runCli(argv('convert', '--frobnicate'), io);

            expect(code).toBe(EXIT_CONFIG_ERROR);
            expect(io.err).toEqual(["error: unknown option '--frobnicate'"]);
        });

        it('should print the version and exit with 0', async () => {
            const io = createTestIO();

            const code = await runCli(argv('--version'), io, '1.2.3');

            expect(code).toBe(EXIT_SUCCESS);
            expect(io.out).toEqual(['1.2.3']);
        });
    });

    describe('buildConvertConfig', () => {
        it('should prefer flags over environment', async () => {
            const io = createTestIO([], {
                PDF_FILE_PATH: 'env.pdf',
                OUTPUT_FILE_PATH: 'env.json',
                LOG_LEVEL: 'error',
                LOG_FORMAT: 'pretty',
            });

            const config = await buildConvertConfig(
                'arg.pdf',
                { output: 'flag.json', pageNumbers: true, logLevel: 'debug', jsonLogs: true },
                io
            );

            expect(config).toMatchObject({
                pdfFilePath: 'arg.pdf',
                outputFilePath: 'flag.json',
                includePageNumbers: true,
                logging: { level: 'debug', structured: true },
            });
        });

        it('should use JSON logs when LOG_FORMAT=json', async () => {
            const io = createTestIO([], { LOG_FORMAT: 'json' });

            const config = await buildConvertConfig(undefined, { pageNumbers: true }, io);

            expect(config.pdfFilePath).toBe('');
            expect(config.outputFilePath).toBeUndefined();
            expect(config.logging).toEqual({ level: 'info', structured: true });
        });
    });

    describe('fields', () => {
        it('should print connection fields as JSON', async () => {
            const io = createTestIO();

            const code = await runCli(argv('fields'), io);

            expect(code).toBe(EXIT_SUCCESS);
            expect(io.out).toHaveLength(1);
            const printed: unknown = JSON.parse(io.out[0]);
            expect(printed).toMatchObject({
                connection_type: 'FileSystem',
                fields: {
                    pdf_file_path: { type: 'string', required: true },
                    output_file_path: { type: 'string', required: false },
                    include_page_numbers: { type: 'bool', default: true },
                },
            });
        });
    });
});
