import fs from 'fs';
import path from 'path';
import { DEFAULT_COUNT } from './generator';
import { ALL_ORACLES } from './types';
import type { Config, OracleBackend } from './types';

const CONFIG_FILE = '.aes-vectors-config.json';
export const DEFAULT_CONFIG: Config = {
    count: DEFAULT_COUNT,
    output: 'vectors.txt',
    oracle: 'openssl',
    opensslPath: 'openssl',
    timeout: null
};

// working directory first, then $AES_VECTORS_HOME when it names a directory
function searchDirs(): string[] {
    const home = process.env.AES_VECTORS_HOME;
    if (!home) {
        return ['.'];
    }
    if (!fs.existsSync(home) || !fs.lstatSync(home).isDirectory()) {
        console.warn('$AES_VECTORS_HOME is not pointing to a valid directory; ignoring...');
        return ['.'];
    }
    return ['.', home];
}

/**
 * The first existing config file on the search path. Without one, the last
 * searched directory is where `saveConfig` creates it.
 */
export function configLocation(): string {
    const candidates = searchDirs().map((dir) => path.join(dir, CONFIG_FILE));
    return candidates.find((file) => fs.existsSync(file)) || candidates[candidates.length - 1];
}

export function loadConfig(): Config {
    const config_path = configLocation();
    if (!fs.existsSync(config_path)) {
        return DEFAULT_CONFIG;
    }
    const unparsed = fs.readFileSync(config_path);
    try {
        return parseConfig(JSON.parse(unparsed.toString()));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`Invalid ${CONFIG_FILE} (${reason}); ignoring...`);
        return DEFAULT_CONFIG;
    }
}

export function saveConfig(config: Config): string {
    const location = configLocation();
    fs.writeFileSync(location, `${JSON.stringify(config, null, 4)}\n`);
    return location;
}

// fields missing from the file keep their defaults
export function parseConfig(parsed: unknown): Config {
    if (!isRecord(parsed)) {
        throw new Error('expected a JSON object');
    }
    const config = { ...DEFAULT_CONFIG };
    if (parsed.count !== undefined) {
        config.count = positiveInteger(parsed.count, 'count');
    }
    if (parsed.output !== undefined) {
        config.output = nonEmptyString(parsed.output, 'output');
    }
    if (parsed.oracle !== undefined) {
        config.oracle = oracleBackend(parsed.oracle);
    }
    if (parsed.opensslPath !== undefined) {
        config.opensslPath = nonEmptyString(parsed.opensslPath, 'opensslPath');
    }
    if (parsed.timeout !== undefined) {
        config.timeout = parsed.timeout === null ? null : positiveNumber(parsed.timeout, 'timeout');
    }
    return config;
}

export function oracleBackend(value: unknown): OracleBackend {
    const backend = ALL_ORACLES.find((name) => name === value);
    if (!backend) {
        throw new Error(`unknown oracle '${value}', expected one of: ${ALL_ORACLES.join(', ')}`);
    }
    return backend;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInteger(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new Error(`'${field}' must be a positive integer`);
    }
    return value;
}

function positiveNumber(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new Error(`'${field}' must be a positive number`);
    }
    return value;
}

function nonEmptyString(value: unknown, field: string): string {
    if (typeof value !== 'string' || value === '') {
        throw new Error(`'${field}' must be a non-empty string`);
    }
    return value;
}
