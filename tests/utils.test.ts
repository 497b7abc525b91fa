import { describe, it, expect, vi } from 'vitest';
import { createHash } from 'crypto';
import { hashBuffer, shortHash, HASH_ALGORITHM } from '../src/utils/hash.js';
import { createLogger } from '../src/utils/logger.js';
import { createEventEmitter } from '../src/utils/events.js';
import { countCharacters, hasExtractableText } from '../src/utils/text.js';
import { runWithCorrelationId } from '../src/errors/index.js';

describe('Utilities', () => {
    describe('Hash utilities', () => {
        it('should hash buffer consistently', () => {
            const buffer = Buffer.from('test content');
            expect(hashBuffer(buffer)).toBe(hashBuffer(Buffer.from('test content')));
        });

        it('should produce a SHA-256 hex digest', () => {
            const buffer = Buffer.from('%PDF-1.4 body');
            const expected = createHash('sha256').update(buffer).digest('hex');
            expect(HASH_ALGORITHM).toBe('sha256');
            expect(hashBuffer(buffer)).toBe(expected);
            expect(hashBuffer(buffer)).toMatch(/^[0-9a-f]{64}$/);
        });

        it('should produce different hashes for different content', () => {
            expect(hashBuffer(Buffer.from('content 1'))).not.toBe(hashBuffer(Buffer.from('content 2')));
        });

        it('should create short hash', () => {
            const full = hashBuffer(Buffer.from('test'));
            const short = shortHash(full);
            expect(short.length).toBe(8);
            expect(full.startsWith(short)).toBe(true);
        });
    });

    describe('Text utilities', () => {
        it('should count code points', () => {
            expect(countCharacters('Hello')).toBe(5);
            expect(countCharacters('')).toBe(0);
            expect(countCharacters('é')).toBe(1);
            expect(countCharacters('a😀b')).toBe(3);
        });

        it('should treat any non-empty text as extractable', () => {
            expect(hasExtractableText('x')).toBe(true);
            expect(hasExtractableText('')).toBe(false);
        });
    });

    describe('Logger', () => {
        it('should create logger with config', () => {
            const logger = createLogger({ level: 'info', structured: true, customLogger: vi.fn() });
            expect(logger.info).toBeDefined();
            expect(logger.warn).toBeDefined();
            expect(logger.error).toBeDefined();
            expect(logger.debug).toBeDefined();
        });

        it('should route entries to a custom logger with the correlation ID', () => {
            const sink = vi.fn();
            const logger = createLogger({ level: 'debug', structured: true, customLogger: sink });

            runWithCorrelationId('pdfj_logger', () => logger.info('Output written', { file: 'a.json' }));

            expect(sink).toHaveBeenCalledWith('info', 'Output written', {
                correlationId: 'pdfj_logger',
                file: 'a.json',
            });
        });

        it('should drop entries below the configured level', () => {
            const sink = vi.fn();
            const logger = createLogger({ level: 'warn', structured: true, customLogger: sink });

            logger.debug('hidden');
            logger.info('hidden');
            logger.warn('shown');
            logger.error('shown too');

            expect(sink).toHaveBeenCalledTimes(2);
            expect(sink.mock.calls.map((call) => call[0])).toEqual(['warn', 'error']);
        });

        it('should keep an explicit correlation ID', () => {
            const sink = vi.fn();
            const logger = createLogger({ level: 'info', structured: true, customLogger: sink });

            logger.error('failed', { correlationId: 'explicit' });

            expect(sink.mock.calls[0][2]).toEqual({ correlationId: 'explicit' });
        });
    });

    describe('EventEmitter', () => {
        it('should emit and receive events', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.on('convert:state', handler);
            emitter.emit('convert:state', { from: 'idle', to: 'validating' });

            expect(handler).toHaveBeenCalledWith({ from: 'idle', to: 'validating' });
        });

        it('should support once listener', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();
            const progress = {
                current: 1,
                total: 2,
                pageNumber: 1,
                status: 'extracted' as const,
                characterCount: 5,
                elapsedMs: 1,
                estimatedRemainingMs: 1,
            };

            emitter.once('extract:page', handler);
            emitter.emit('extract:page', progress);
            emitter.emit('extract:page', { ...progress, current: 2, pageNumber: 2 });

            expect(handler).toHaveBeenCalledTimes(1);
        });

        it('should remove listeners with off', () => {
            const emitter = createEventEmitter();
            const handler = vi.fn();

            emitter.on('convert:state', handler);
            emitter.off('convert:state', handler);
            emitter.emit('convert:state', { from: 'validating', to: 'failed' });

            expect(handler).not.toHaveBeenCalled();
        });
    });
});
