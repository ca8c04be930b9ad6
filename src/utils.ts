import { spawn as _spawn } from 'child_process';
import { utils } from 'ethers';
import { PreconditionViolation } from './errors';
import { BLOCK_SIZE } from './types';
import type { Block } from './types';

export function assertBlock(bytes: Uint8Array, what: string): asserts bytes is Block {
    if (bytes.length !== BLOCK_SIZE) {
        throw new PreconditionViolation(`${what} must be exactly ${BLOCK_SIZE} bytes, got ${bytes.length}`);
    }
}

// lowercase, without the `0x` prefix
export function blockToHex(block: Block): string {
    assertBlock(block, 'block');
    return utils.hexlify(block).slice(2);
}

export function hexToBlock(hex: string): Block {
    const prefixed = hex.startsWith('0x') ? hex : `0x${hex}`;
    if (!utils.isHexString(prefixed, BLOCK_SIZE)) {
        throw new PreconditionViolation(`'${hex}' is not a ${BLOCK_SIZE}-byte hex string`);
    }
    return utils.arrayify(prefixed);
}

/**
 * Source of key and plaintext material. Implementations must be
 * cryptographically secure; a seedable generator is not acceptable.
 */
export interface RandomSource {
    randomBytes(length: number): Uint8Array;
}

export const secureRandom: RandomSource = {
    randomBytes: (length: number) => utils.randomBytes(length)
};

export interface ProcessResult {
    status: number | null;
    signal: NodeJS.Signals | null;
    stdout: Uint8Array;
    stderr: string;
    // set when writing the input failed before the process closed
    stdinError?: string;
}

export interface RunOptions {
    input: Uint8Array;
    timeoutMs?: number;
}

// Rejects only when the process could not be started; exit status and
// signal are reported through the result.
export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessResult>;

// runs a single command without a shell, feeding `input` on stdin
// and buffering stdout/stderr
export const spawnProcess: ProcessRunner = (command, args, options) => {
    return new Promise((resolve, reject) => {
        const child = _spawn(command, args, { stdio: 'pipe', timeout: options.timeoutMs });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.on('error', reject);
        // stdin breaks when the process exits (or never starts) without reading
        // its input; `error` and `close` report what happened, so only keep the code
        let stdinError: string | undefined;
        child.stdin.on('error', (err: NodeJS.ErrnoException) => {
            stdinError = err.code || err.message;
        });
        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        child.on('close', (status, signal) => {
            resolve({
                status,
                signal,
                stdout: new Uint8Array(Buffer.concat(stdout)),
                stderr: Buffer.concat(stderr).toString(),
                stdinError
            });
        });
        child.stdin.end(options.input);
    });
};
