import { OracleExecutionFailed, OracleUnavailable } from '../errors';
import type { Block } from '../types';
import { blockToHex, spawnProcess } from '../utils';
import type { ProcessRunner } from '../utils';
import { checkCiphertext, checkInputs } from './oracle';
import type { BlockCipherOracle } from './oracle';

export interface OpensslOracleOptions {
    // path to the openssl binary, resolved through $PATH when bare
    binary?: string;
    timeoutMs?: number;
    runner?: ProcessRunner;
}

/**
 * Oracle backed by the `openssl enc` command line tool.
 * One short-lived process per block.
 */
export class OpensslOracle implements BlockCipherOracle {
    readonly name = 'openssl';
    private readonly binary: string;
    private readonly timeoutMs?: number;
    private readonly runner: ProcessRunner;

    constructor(options: OpensslOracleOptions = {}) {
        this.binary = options.binary || 'openssl';
        this.timeoutMs = options.timeoutMs;
        this.runner = options.runner || spawnProcess;
    }

    args(key: Block): string[] {
        return ['enc', '-aes-128-ecb', '-K', blockToHex(key), '-nosalt', '-nopad'];
    }

    async encryptBlock(key: Block, plaintext: Block): Promise<Block> {
        checkInputs(key, plaintext);

        const result = await this.runner(this.binary, this.args(key), {
            input: plaintext,
            timeoutMs: this.timeoutMs
        }).catch((err: unknown) => {
            const reason = err instanceof Error ? err.message : String(err);
            throw new OracleUnavailable(`cannot run '${this.binary}': ${reason}`);
        });

        if (result.status === null) {
            throw new OracleUnavailable(`'${this.binary}' was terminated by ${result.signal || 'an unknown signal'}`);
        }
        if (result.status !== 0) {
            throw new OracleExecutionFailed(`'${this.binary}' exited with code ${result.status}`, result.stderr.trim());
        }
        if (result.stdinError) {
            throw new OracleExecutionFailed(
                `'${this.binary}' exited before reading the plaintext (${result.stdinError})`,
                result.stderr.trim()
            );
        }
        return checkCiphertext(result.stdout);
    }
}
