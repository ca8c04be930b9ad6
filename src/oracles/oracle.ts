import { OracleOutputMalformed } from '../errors';
import { BLOCK_SIZE } from '../types';
import type { Block } from '../types';
import { assertBlock } from '../utils';

/**
 * Trusted single-block AES-128-ECB encryption capability.
 *
 * Encrypting one block is deterministic and independent of any other block:
 * the same key and plaintext always yield the same ciphertext. Implementations
 * only frame the call and validate lengths; they never implement the cipher.
 */
export interface BlockCipherOracle {
    readonly name: string;
    encryptBlock(key: Block, plaintext: Block): Promise<Block>;
}

export function checkInputs(key: Uint8Array, plaintext: Uint8Array) {
    assertBlock(key, 'key');
    assertBlock(plaintext, 'plaintext');
}

// never truncate or pad what the oracle returned
export function checkCiphertext(ciphertext: Uint8Array): Block {
    if (ciphertext.length !== BLOCK_SIZE) {
        throw new OracleOutputMalformed(ciphertext.length);
    }
    return ciphertext;
}
