/**
 * Mock Index
 *
 * Central export for all test mocks
 */

// PDF Reader
export {
    createMockPdfReader,
    createMockPdfReaderWithError,
    createMockPdfDocument,
    type FakePage,
    type MockPdfReader,
    type MockPdfDocument,
} from './pdf-reader.mock.js';

// Logger
export { createMockLogger, loggedMessages, type MockLogger } from './logger.mock.js';

// Fixtures
export {
    MINIMAL_PDF_CONTENT,
    buildPdf,
    FIXED_NOW,
    createTempDir,
    removeTempDir,
    writeFixture,
    pathExists,
    createMockFacts,
    createMockPages,
} from './fixtures.js';
