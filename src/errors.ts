/**
 * Error classes for vector generation.
 *
 * Every error aborts the run; nothing here is retried.
 * - PreconditionViolation: the caller broke a contract (block length, count)
 * - OracleError and subclasses: the trusted encryption primitive misbehaved
 * - GenerationStageError: an oracle failure tagged with the stage it hit
 * - IOFailure: the output sink could not be written
 */

import type { GenerationStage } from './types';

export class PreconditionViolation extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionViolation';
    }
}

/**
 * Base class for failures attributable to the encryption oracle.
 */
export class OracleError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OracleError';
    }
}

/**
 * The oracle could not be invoked at all (missing binary, permissions, killed).
 */
export class OracleUnavailable extends OracleError {
    constructor(message: string) {
        super(message);
        this.name = 'OracleUnavailable';
    }
}

/**
 * The oracle ran and reported failure. `diagnostic` holds its own output.
 */
export class OracleExecutionFailed extends OracleError {
    constructor(message: string, readonly diagnostic: string) {
        super(diagnostic ? `${message}:\n${diagnostic}` : message);
        this.name = 'OracleExecutionFailed';
    }
}

export class OracleOutputMalformed extends OracleError {
    constructor(readonly actualLength: number) {
        super(`oracle returned ${actualLength} bytes, expected exactly 16`);
        this.name = 'OracleOutputMalformed';
    }
}

/**
 * The oracle answered the known-answer vector with the wrong ciphertext.
 */
export class KnownAnswerMismatch extends OracleError {
    constructor(readonly expected: string, readonly actual: string) {
        super(`known-answer ciphertext mismatch: expected ${expected}, got ${actual}`);
        this.name = 'KnownAnswerMismatch';
    }
}

export class GenerationStageError extends Error {
    constructor(readonly stage: GenerationStage, readonly oracleError: OracleError) {
        super(`${describeStage(stage)} failed: ${oracleError.message}`);
        this.name = 'GenerationStageError';
    }
}

export class IOFailure extends Error {
    constructor(readonly path: string, reason: string) {
        super(`cannot write ${path}: ${reason}`);
        this.name = 'IOFailure';
    }
}

export function describeStage(stage: GenerationStage): string {
    switch (stage.kind) {
        case 'known-answer':
            return 'known-answer validation';
        case 'random':
            return `random vector ${stage.index} of ${stage.total}`;
    }
}
