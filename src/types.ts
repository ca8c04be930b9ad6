export const BLOCK_SIZE = 16;

// Raw 16-byte unit: key, plaintext or ciphertext.
export type Block = Uint8Array;

export interface Vector {
    readonly key: Block;
    readonly plaintext: Block;
    readonly ciphertext: Block;
}

// Element 0 is always the known-answer vector.
export type VectorSet = readonly Vector[];

export const ALL_ORACLES = ['openssl', 'noble'] as const;
export type OracleBackend = (typeof ALL_ORACLES)[number];

export interface Config {
    count: number;
    output: string;
    oracle: OracleBackend;
    opensslPath: string;
    // seconds; null disables the limit
    timeout: number | null;
}

export type GenerationStage = { kind: 'known-answer' } | { kind: 'random'; index: number; total: number };

export interface GenerateReport {
    count: number;
    output: string;
    oracle: string;
}
