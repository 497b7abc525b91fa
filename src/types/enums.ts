/**
 * Conversion pipeline states
 * idle → validating → extracting → assembling → writing → done, with failed
 * reachable from any non-terminal state
 */
export const ConversionStateEnum = {
    IDLE: 'idle',
    VALIDATING: 'validating',
    EXTRACTING: 'extracting',
    ASSEMBLING: 'assembling',
    WRITING: 'writing',
    DONE: 'done',
    FAILED: 'failed',
} as const;

export type ConversionStateEnumType = (typeof ConversionStateEnum)[keyof typeof ConversionStateEnum];

/**
 * States in which work happens and an error can surface
 */
export type ConversionStage = Exclude<ConversionStateEnumType, 'idle' | 'done' | 'failed'>;

/**
 * Outcome of extracting a single page
 */
export const PageStatusEnum = {
    EXTRACTED: 'extracted',
    EMPTY: 'empty',
    FAILED: 'failed',
} as const;

export type PageStatusEnumType = (typeof PageStatusEnum)[keyof typeof PageStatusEnum];
