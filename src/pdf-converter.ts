import type { ResolvedConversionOptions } from './types/config.types.js';
import type { ExtractionResult, PageProgress, ProgressCallback } from './types/extraction.types.js';
import type { PdfDocumentHandle } from './types/pdf-reader.types.js';
import { ConversionStateEnum } from './types/enums.js';
import type { ConversionStage, ConversionStateEnumType } from './types/enums.js';
import {
    ConverterStateError,
    ExtractionFailedError,
    InvalidInputError,
    PdfConversionError,
    WriteError,
    generateCorrelationId,
    runWithCorrelationId,
    toError,
} from './errors/index.js';
import type { FileValidator } from './services/file.validator.js';
import type { MetadataCollector } from './services/metadata.collector.js';
import type { PageTextExtractor } from './services/page-text.extractor.js';
import type { OutputWriter } from './services/output.writer.js';
import { assembleExtractionResult } from './services/json.assembler.js';
import { PdfConverterEventEmitter } from './utils/events.js';
import type { Logger } from './utils/logger.js';

/**
 * Dependencies for PdfConverter (injected by the factory)
 */
export interface PdfConverterDependencies {
    validator: FileValidator;
    collector: MetadataCollector;
    extractor: PageTextExtractor;
    writer: OutputWriter;
    logger: Logger;
    /** Optional clock, used for metadata timestamps */
    now?: () => Date;
}

const TRANSITIONS: Record<ConversionStateEnumType, readonly ConversionStateEnumType[]> = {
    idle: ['validating'],
    validating: ['extracting', 'failed'],
    extracting: ['assembling', 'failed'],
    assembling: ['writing', 'failed'],
    writing: ['done', 'failed'],
    done: [],
    failed: [],
};

/**
 * Converts one PDF into its JSON artifact.
 *
 * Runs validating → extracting → assembling → writing → done once.
 * Any fatal error moves it to `failed` and is rethrown with its stage set.
 *
 * @example
 * ```typescript
 * const converter = createPdfConverter({ pdfFilePath: 'report.pdf' });
 * converter.events.on('extract:page', (p) => console.log(`${p.current}/${p.total}`));
 * const result = await converter.convert();
 * ```
 */
export class PdfConverter {
    public readonly events: PdfConverterEventEmitter = new PdfConverterEventEmitter();

    private readonly options: ResolvedConversionOptions;
    private readonly onProgress?: ProgressCallback;
    private readonly deps: PdfConverterDependencies;
    private readonly logger: Logger;
    private currentState: ConversionStateEnumType = ConversionStateEnum.IDLE;
    private runCorrelationId?: string;

    constructor(
        options: ResolvedConversionOptions,
        deps: PdfConverterDependencies,
        onProgress?: ProgressCallback
    ) {
        this.options = options;
        this.deps = deps;
        this.logger = deps.logger;
        this.onProgress = onProgress;
    }

    get state(): ConversionStateEnumType {
        return this.currentState;
    }

    get outputFilePath(): string {
        return this.options.outputFilePath;
    }

    /** Correlation ID of the run, once `convert()` has been called */
    get correlationId(): string | undefined {
        return this.runCorrelationId;
    }

    async convert(): Promise<ExtractionResult> {
        if (this.currentState !== ConversionStateEnum.IDLE) {
            throw new ConverterStateError(`Converter already used (state: ${this.currentState})`, {
                state: this.currentState,
            });
        }

        const correlationId = generateCorrelationId();
        this.runCorrelationId = correlationId;

        // Everything awaited below logs and raises errors under this run's ID
        return runWithCorrelationId(correlationId, () => this.run(correlationId));
    }

    private async run(correlationId: string): Promise<ExtractionResult> {
        const { pdfFilePath, outputFilePath, includePageNumbers } = this.options;
        const startTime = Date.now();
        let stage: ConversionStage = ConversionStateEnum.VALIDATING;
        let result: ExtractionResult | undefined;

        this.events.emit('convert:start', { pdfFilePath, outputFilePath, correlationId });
        this.logger.info('Starting PDF to JSON conversion', { file: pdfFilePath, output: outputFilePath });

        try {
            this.transition(ConversionStateEnum.VALIDATING);
            await this.deps.validator.validate(pdfFilePath);
            this.deps.validator.validateOutputPath(pdfFilePath, outputFilePath);
            const { buffer, facts } = await this.deps.collector.collect(pdfFilePath);
            const document = await this.openDocument(buffer, facts.fileName, pdfFilePath);

            stage = ConversionStateEnum.EXTRACTING;
            this.transition(stage);
            const { pages, warnings } = await this.deps.extractor.extractDocument(
                document,
                facts.fileName,
                (progress) => this.reportProgress(progress)
            );
            if (warnings.length > 0) {
                this.logger.debug('Extraction warnings', { file: facts.fileName, warnings });
            }

            stage = ConversionStateEnum.ASSEMBLING;
            this.transition(stage);
            result = assembleExtractionResult(facts, pages, {
                includePageNumbers,
                now: this.deps.now?.(),
            });

            stage = ConversionStateEnum.WRITING;
            this.transition(stage);
            await this.deps.writer.write(result, outputFilePath);

            this.transition(ConversionStateEnum.DONE);
            const processingMs = Date.now() - startTime;

            this.logger.info('Successfully converted PDF to JSON', {
                file: pdfFilePath,
                output: outputFilePath,
                totalPages: result.metadata.total_pages,
                totalCharacters: result.metadata.total_characters,
                processingMs,
            });
            this.events.emit('convert:complete', { result, outputFilePath, processingMs });

            return result;
        } catch (error) {
            const failure = this.toFailure(error, stage, result);
            if (this.currentState !== ConversionStateEnum.DONE) {
                this.transition(ConversionStateEnum.FAILED);
            }

            this.logger.error('Conversion failed', {
                file: pdfFilePath,
                stage: failure.stage,
                code: failure.code,
                error: failure.message,
            });
            this.events.emit('convert:error', { error: failure });

            throw failure;
        }
    }

    /**
     * A file the reader cannot open is not a PDF container: invalid input
     */
    private async openDocument(buffer: Buffer, source: string, pdfFilePath: string): Promise<PdfDocumentHandle> {
        try {
            return await this.deps.extractor.open(buffer, source);
        } catch (error) {
            if (!(error instanceof ExtractionFailedError)) {
                throw error;
            }
            throw new InvalidInputError(
                `File cannot be opened as a PDF: ${pdfFilePath} (${error.cause?.message ?? error.message})`,
                pdfFilePath,
                { filename: source },
                { cause: error.cause ?? error, operation: 'openDocument' }
            );
        }
    }

    private reportProgress(progress: PageProgress): void {
        this.logger.debug('Page processed', {
            page: progress.pageNumber,
            status: progress.status,
            current: progress.current,
            total: progress.total,
        });
        this.onProgress?.(progress);
        this.events.emit('extract:page', progress);
    }

    private toFailure(
        error: unknown,
        stage: ConversionStage,
        result: ExtractionResult | undefined
    ): PdfConversionError {
        let failure: PdfConversionError;
        if (error instanceof PdfConversionError) {
            failure = error;
        } else {
            const cause = toError(error);
            failure = new PdfConversionError(cause.message, 'UNEXPECTED_ERROR', undefined, {
                cause,
                operation: stage,
            });
        }

        failure.stage ??= stage;
        if (failure instanceof WriteError && result) {
            failure.result = result;
        }

        return failure;
    }

    private transition(to: ConversionStateEnumType): void {
        const from = this.currentState;
        if (!TRANSITIONS[from].includes(to)) {
            throw new ConverterStateError(`Illegal state transition ${from} → ${to}`, { from, to });
        }

        this.currentState = to;
        this.events.emit('convert:state', { from, to });
    }
}
