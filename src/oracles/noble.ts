import { ecb } from '@noble/ciphers/aes';
import { OracleExecutionFailed } from '../errors';
import type { Block } from '../types';
import { checkCiphertext, checkInputs } from './oracle';
import type { BlockCipherOracle } from './oracle';

/**
 * In-process oracle backed by @noble/ciphers.
 * ECB without padding, so exactly one block in and one block out.
 */
export class NobleOracle implements BlockCipherOracle {
    readonly name = 'noble';

    async encryptBlock(key: Block, plaintext: Block): Promise<Block> {
        checkInputs(key, plaintext);

        return checkCiphertext(encrypt(key, plaintext));
    }
}

function encrypt(key: Block, plaintext: Block): Uint8Array {
    try {
        return ecb(key, { disablePadding: true }).encrypt(plaintext);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new OracleExecutionFailed('@noble/ciphers rejected the block', reason);
    }
}
