import { Command, CommanderError, Option } from 'commander';
import { parse as parseDotenv } from 'dotenv';
import { readFile } from 'fs/promises';
import { loadEnv } from '../config/env.js';
import { getConnectionMetadata } from '../config/constants.js';
import { ConfigurationError, PdfConversionError, toError } from '../errors/index.js';
import { createPdfConverter } from '../pdf-converter.factory.js';
import type { PdfConverter } from '../pdf-converter.js';
import type { PdfConverterConfig } from '../types/config.types.js';
import type { PageProgress } from '../types/extraction.types.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

/**
 * Process-facing seams of the CLI
 */
export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    env: NodeJS.ProcessEnv;
    createConverter: (config: PdfConverterConfig) => PdfConverter;
}

export interface ConvertCommandOptions {
    output?: string;
    pageNumbers: boolean;
    envFile?: string;
    logLevel?: 'debug' | 'info' | 'warn' | 'error';
    jsonLogs?: boolean;
}

export function defaultCliIO(): CliIO {
    return {
        stdout: (line) => console.log(line),
        stderr: (line) => console.error(line),
        env: process.env,
        createConverter: createPdfConverter,
    };
}

function formatProgress(progress: PageProgress): string {
    const suffix = progress.status === 'extracted' ? `${progress.characterCount} chars` : progress.status;
    return `Extracting page ${progress.current}/${progress.total} (${suffix})`;
}

/**
 * Merge variables from an env file without overriding ones already set
 */
async function loadEnvFile(envFile: string, target: NodeJS.ProcessEnv): Promise<void> {
    let content: string;
    try {
        content = await readFile(envFile, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Cannot load env file ${envFile}: ${toError(error).message}`, {
            envFile,
        });
    }

    for (const [key, value] of Object.entries(parseDotenv(content))) {
        if (target[key] === undefined) {
            target[key] = value;
        }
    }
}

/**
 * Build the converter config from the positional argument, flags and environment.
 * Flags win over environment variables.
 */
export async function buildConvertConfig(
    pdfArg: string | undefined,
    options: ConvertCommandOptions,
    io: CliIO
): Promise<PdfConverterConfig> {
    if (options.envFile) {
        await loadEnvFile(options.envFile, io.env);
    }

    const env = loadEnv(io.env);

    return {
        pdfFilePath: pdfArg ?? env.PDF_FILE_PATH ?? '',
        outputFilePath: options.output ?? env.OUTPUT_FILE_PATH,
        includePageNumbers: options.pageNumbers === false ? false : env.INCLUDE_PAGE_NUMBERS,
        logging: {
            level: options.logLevel ?? env.LOG_LEVEL,
            structured: options.jsonLogs === true || env.LOG_FORMAT === 'json',
        },
        onProgress: (progress) => io.stdout(formatProgress(progress)),
    };
}

async function runConvert(
    pdfArg: string | undefined,
    options: ConvertCommandOptions,
    io: CliIO
): Promise<number> {
    let converter: PdfConverter;
    let config: PdfConverterConfig;

    try {
        config = await buildConvertConfig(pdfArg, options, io);
        converter = io.createConverter(config);
    } catch (error) {
        io.stderr(`Configuration error: ${toError(error).message}`);
        return EXIT_CONFIG_ERROR;
    }

    try {
        const result = await converter.convert();
        const { metadata } = result;

        io.stdout('PDF to JSON conversion completed successfully!');
        io.stdout(`PDF File: ${metadata.source_file_name}`);
        io.stdout(`Total Pages: ${metadata.total_pages}`);
        io.stdout(`Pages With Text: ${metadata.pages_with_extractable_text}`);
        io.stdout(`Total Characters: ${metadata.total_characters.toLocaleString('en-US')}`);
        io.stdout(`Output saved to: ${converter.outputFilePath}`);
        io.stdout(`Data Type: ${metadata.data_type}`);
        io.stdout(`Timestamp: ${metadata.timestamp}`);
        return EXIT_SUCCESS;
    } catch (error) {
        if (error instanceof PdfConversionError) {
            io.stderr(`Conversion failed during ${error.stage ?? 'unknown'} stage [${error.code}]: ${error.message}`);
        } else {
            io.stderr(`Conversion failed: ${toError(error).message}`);
        }
        io.stderr(`Input: ${config.pdfFilePath || '(none)'}`);
        return EXIT_FAILURE;
    }
}

/**
 * Create the CLI program. The resolved exit code is reported through `onExit`.
 */
export function createProgram(io: CliIO, onExit: (code: number) => void, version: string = '0.0.0'): Command {
    const program = new Command();

    // Set before adding commands so subcommands inherit them
    program
        .name('pdf-json-extract')
        .description('Convert a PDF document into a JSON file of metadata and per-page text')
        .version(version)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => io.stdout(text.trimEnd()),
            writeErr: (text) => io.stderr(text.trimEnd()),
        });

    program
        .command('convert', { isDefault: true })
        .description('Convert one PDF to JSON (default command; falls back to PDF_FILE_PATH)')
        .argument('[pdf]', 'Path to the PDF file')
        .option('-o, --output <path>', 'Output JSON path (default: PDF name with .json extension)')
        .option('--no-page-numbers', 'Omit "--- Page N ---" markers from full_text')
        .option('--env-file <path>', 'Load environment variables from this file')
        .addOption(
            new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error'])
        )
        .option('--json-logs', 'Emit structured JSON logs')
        .action(async (pdfArg: string | undefined, options: ConvertCommandOptions) => {
            onExit(await runConvert(pdfArg, options, io));
        });

    program
        .command('fields')
        .description('Print the connection fields a host must collect')
        .action(() => {
            io.stdout(JSON.stringify(getConnectionMetadata(), null, 2));
            onExit(EXIT_SUCCESS);
        });

    return program;
}

/**
 * Parse argv and run the selected command
 */
export async function runCli(argv: string[], io: CliIO = defaultCliIO(), version?: string): Promise<number> {
    let exitCode = EXIT_SUCCESS;
    const program = createProgram(io, (code) => {
        exitCode = code;
    }, version);

    try {
        await program.parseAsync(argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            // --help and --version end with exit code 0; usage errors are configuration errors
            return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_CONFIG_ERROR;
        }
        throw error;
    }
    return exitCode;
}
