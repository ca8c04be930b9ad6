import type { Config } from '../types';
import type { ProcessRunner } from '../utils';
import { NobleOracle } from './noble';
import { OpensslOracle } from './openssl';
import type { BlockCipherOracle } from './oracle';

export type { BlockCipherOracle } from './oracle';
export { OpensslOracle } from './openssl';
export type { OpensslOracleOptions } from './openssl';
export { NobleOracle } from './noble';

export function createOracle(
    config: Pick<Config, 'oracle' | 'opensslPath' | 'timeout'>,
    runner?: ProcessRunner
): BlockCipherOracle {
    switch (config.oracle) {
        case 'openssl':
            return new OpensslOracle({
                binary: config.opensslPath,
                timeoutMs: config.timeout === null ? undefined : Math.ceil(config.timeout * 1000),
                runner
            });
        case 'noble':
            return new NobleOracle();
    }
}
