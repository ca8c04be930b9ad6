import { oracleBackend } from './config';
import { PreconditionViolation } from './errors';
import { generateVectors, writeVectors } from './generator';
import { createOracle } from './oracles';
import type { Config, GenerateReport } from './types';
import type { ProcessRunner, RandomSource } from './utils';

// Raw command line values; anything left undefined falls back to the config.
export interface CliOverrides {
    count?: string;
    output?: string;
    oracle?: string;
    openssl?: string;
    timeout?: string;
}

export interface GenerateDeps {
    runner?: ProcessRunner;
    random?: RandomSource;
}

export function parseCount(value: string): number {
    if (!/^\d+$/.test(value) || Number(value) < 1) {
        throw new PreconditionViolation(`vector count must be a positive integer, got '${value}'`);
    }
    return Number(value);
}

export function parseTimeout(value: string): number {
    const seconds = Number(value);
    if (!/^\d+(\.\d+)?$/.test(value) || !Number.isFinite(seconds) || seconds <= 0) {
        throw new PreconditionViolation(`timeout must be a positive number of seconds, got '${value}'`);
    }
    return seconds;
}

export function resolveConfig(config: Config, overrides: CliOverrides): Config {
    let oracle = config.oracle;
    if (overrides.oracle !== undefined) {
        try {
            oracle = oracleBackend(overrides.oracle);
        } catch (err) {
            throw new PreconditionViolation(err instanceof Error ? err.message : String(err));
        }
    }
    return {
        count: overrides.count === undefined ? config.count : parseCount(overrides.count),
        output: overrides.output === undefined ? config.output : overrides.output,
        oracle,
        opensslPath: overrides.openssl === undefined ? config.opensslPath : overrides.openssl,
        timeout: overrides.timeout === undefined ? config.timeout : parseTimeout(overrides.timeout)
    };
}

export async function generate(config: Config, deps: GenerateDeps = {}): Promise<GenerateReport> {
    const oracle = createOracle(config, deps.runner);
    const vectors = await generateVectors(oracle, config.count, deps.random);
    const count = writeVectors(vectors, config.output);
    return { count, output: config.output, oracle: oracle.name };
}
