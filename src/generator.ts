import fs from 'fs';
import { GenerationStageError, IOFailure, KnownAnswerMismatch, OracleError, PreconditionViolation } from './errors';
import type { BlockCipherOracle } from './oracles';
import { BLOCK_SIZE } from './types';
import type { Block, GenerationStage, Vector, VectorSet } from './types';
import { blockToHex, hexToBlock, secureRandom } from './utils';
import type { RandomSource } from './utils';

export const DEFAULT_COUNT = 20;

// writing to this "path" sends the vectors to stdout
export const STDOUT_SINK = '-';

/**
 * The classic AES-128 known-answer triple. It is always emitted first and
 * checks the oracle before any random vector is trusted to it.
 */
export const KNOWN_ANSWER = {
    key: '000102030405060708090a0b0c0d0e0f',
    plaintext: '00112233445566778899aabbccddeeff',
    ciphertext: '69c4e0d86a7b0430d8cdb78070b4c55a'
} as const;

/**
 * Builds `count` vectors: the known-answer vector followed by `count - 1`
 * vectors with fresh random key and plaintext. Oracle calls are sequential and
 * any failure aborts the whole run.
 */
export async function generateVectors(
    oracle: BlockCipherOracle,
    count: number = DEFAULT_COUNT,
    random: RandomSource = secureRandom
): Promise<VectorSet> {
    if (!Number.isInteger(count) || count < 1) {
        throw new PreconditionViolation(`vector count must be a positive integer, got ${count}`);
    }

    const vectors: Vector[] = [await knownAnswerVector(oracle)];

    const total = count - 1;
    for (let index = 1; index <= total; index++) {
        const key = random.randomBytes(BLOCK_SIZE);
        const plaintext = random.randomBytes(BLOCK_SIZE);
        const ciphertext = await encryptAt({ kind: 'random', index, total }, oracle, key, plaintext);
        vectors.push(Object.freeze({ key, plaintext, ciphertext }));
    }

    return Object.freeze(vectors);
}

async function knownAnswerVector(oracle: BlockCipherOracle): Promise<Vector> {
    const stage: GenerationStage = { kind: 'known-answer' };
    const key = hexToBlock(KNOWN_ANSWER.key);
    const plaintext = hexToBlock(KNOWN_ANSWER.plaintext);
    const ciphertext = await encryptAt(stage, oracle, key, plaintext);

    const actual = blockToHex(ciphertext);
    if (actual !== KNOWN_ANSWER.ciphertext) {
        throw new GenerationStageError(stage, new KnownAnswerMismatch(KNOWN_ANSWER.ciphertext, actual));
    }
    return Object.freeze({ key, plaintext, ciphertext });
}

async function encryptAt(
    stage: GenerationStage,
    oracle: BlockCipherOracle,
    key: Block,
    plaintext: Block
): Promise<Block> {
    try {
        return await oracle.encryptBlock(key, plaintext);
    } catch (err) {
        if (err instanceof OracleError) {
            throw new GenerationStageError(stage, err);
        }
        throw err;
    }
}

/**
 * `<key> <plaintext> <ciphertext>` per line in lowercase hex, newline-terminated.
 */
export function serializeVectors(vectors: VectorSet): string {
    return vectors.map((vector) => `${formatVector(vector)}\n`).join('');
}

function formatVector({ key, plaintext, ciphertext }: Vector): string {
    return [key, plaintext, ciphertext].map(blockToHex).join(' ');
}

/**
 * Writes the whole set in one go and returns the number of vectors written.
 * Files are written next to the target and renamed over it, so an interrupted
 * write never looks like a finished one.
 */
export function writeVectors(vectors: VectorSet, output: string): number {
    const text = serializeVectors(vectors);

    if (output === STDOUT_SINK) {
        process.stdout.write(text);
        return vectors.length;
    }

    const staging = `${output}.tmp`;
    try {
        fs.writeFileSync(staging, text);
        fs.renameSync(staging, output);
    } catch (err) {
        discardStaging(staging);
        const reason = err instanceof Error ? err.message : String(err);
        throw new IOFailure(output, reason);
    }
    return vectors.length;
}

// best effort: the write failure is what gets reported
function discardStaging(staging: string) {
    try {
        if (fs.existsSync(staging)) {
            fs.unlinkSync(staging);
        }
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`Could not remove ${staging}: ${reason}`);
    }
}
