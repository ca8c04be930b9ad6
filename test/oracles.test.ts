import { expect, use } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import {
    OracleExecutionFailed,
    OracleOutputMalformed,
    OracleUnavailable,
    PreconditionViolation
} from '../src/errors';
import { KNOWN_ANSWER } from '../src/generator';
import { createOracle, NobleOracle, OpensslOracle } from '../src/oracles';
import { blockToHex, hexToBlock } from '../src/utils';
import { exited, fakeRunner, rejectionOf } from './test-utils';

use(chaiAsPromised);

const key = hexToBlock(KNOWN_ANSWER.key);
const plaintext = hexToBlock(KNOWN_ANSWER.plaintext);

describe('Noble oracle', () => {
    const oracle = new NobleOracle();

    it('should produce the known-answer ciphertext', async () => {
        const ciphertext = await oracle.encryptBlock(key, plaintext);
        expect(blockToHex(ciphertext)).to.equal('69c4e0d86a7b0430d8cdb78070b4c55a');
    });

    it('should be deterministic', async () => {
        const randomKey = hexToBlock('2b7e151628aed2a6abf7158809cf4f3c');
        const block = hexToBlock('6bc1bee22e409f96e93d7e117393172a');
        const first = await oracle.encryptBlock(randomKey, block);
        const second = await oracle.encryptBlock(randomKey, block);
        expect(blockToHex(first)).to.equal(blockToHex(second));
        expect(first).to.have.lengthOf(16);
    });

    it('should reject malformed blocks', async () => {
        await expect(oracle.encryptBlock(new Uint8Array(24), plaintext)).to.be.rejectedWith(
            PreconditionViolation,
            'key must be exactly 16 bytes, got 24'
        );
        await expect(oracle.encryptBlock(key, new Uint8Array(32))).to.be.rejectedWith(
            PreconditionViolation,
            'plaintext must be exactly 16 bytes, got 32'
        );
    });
});

describe('OpenSSL oracle', () => {
    const ciphertext = new Uint8Array(16).fill(0xaa);

    it('should invoke openssl enc for a single unpadded block', async () => {
        const { runner, calls } = fakeRunner(() => exited(ciphertext));
        const oracle = new OpensslOracle({ runner });

        const result = await oracle.encryptBlock(key, plaintext);

        expect(result).to.eql(ciphertext);
        expect(calls).to.have.lengthOf(1);
        expect(calls[0].command).to.equal('openssl');
        expect(calls[0].args).to.eql([
            'enc',
            '-aes-128-ecb',
            '-K',
            '000102030405060708090a0b0c0d0e0f',
            '-nosalt',
            '-nopad'
        ]);
        expect(calls[0].options.input).to.eql(plaintext);
        expect(calls[0].options.timeoutMs).to.be.undefined;
    });

    it('should use the configured binary and timeout', async () => {
        const { runner, calls } = fakeRunner(() => exited(ciphertext));
        const oracle = new OpensslOracle({ binary: '/opt/openssl/bin/openssl', timeoutMs: 5000, runner });

        await oracle.encryptBlock(key, plaintext);

        expect(calls[0].command).to.equal('/opt/openssl/bin/openssl');
        expect(calls[0].options.timeoutMs).to.equal(5000);
    });

    it('should not run anything for malformed blocks', async () => {
        const { runner, calls } = fakeRunner(() => exited(ciphertext));
        const oracle = new OpensslOracle({ runner });

        await expect(oracle.encryptBlock(new Uint8Array(15), plaintext)).to.be.rejectedWith(PreconditionViolation);
        expect(calls).to.be.empty;
    });

    it('should report a missing binary as unavailable', async () => {
        const { runner } = fakeRunner(() => {
            throw new Error('spawn openssl ENOENT');
        });
        const oracle = new OpensslOracle({ runner });

        const err = await rejectionOf(oracle.encryptBlock(key, plaintext), OracleUnavailable);
        expect(err.message).to.equal("cannot run 'openssl': spawn openssl ENOENT");
    });

    it('should report a killed process as unavailable', async () => {
        const { runner } = fakeRunner(() => ({ status: null, signal: 'SIGTERM', stdout: new Uint8Array(0), stderr: '' }));
        const oracle = new OpensslOracle({ runner });

        const err = await rejectionOf(oracle.encryptBlock(key, plaintext), OracleUnavailable);
        expect(err.message).to.equal("'openssl' was terminated by SIGTERM");
    });

    it('should surface the diagnostic of a failed run', async () => {
        const { runner } = fakeRunner(() => exited(new Uint8Array(0), 1, 'hex string is too short\n'));
        const oracle = new OpensslOracle({ runner });

        const err = await rejectionOf(oracle.encryptBlock(key, plaintext), OracleExecutionFailed);
        expect(err.diagnostic).to.equal('hex string is too short');
        expect(err.message).to.equal("'openssl' exited with code 1:\nhex string is too short");
    });

    it('should fail a clean exit that left the plaintext unread', async () => {
        const { runner } = fakeRunner(() => ({ ...exited(new Uint8Array(16)), stdinError: 'EPIPE' }));
        const oracle = new OpensslOracle({ runner });

        const err = await rejectionOf(oracle.encryptBlock(key, plaintext), OracleExecutionFailed);
        expect(err.message).to.equal("'openssl' exited before reading the plaintext (EPIPE)");
        expect(err.diagnostic).to.equal('');
    });

    it('should never truncate or pad the output', async () => {
        for (const length of [0, 15, 17, 32]) {
            const { runner } = fakeRunner(() => exited(new Uint8Array(length)));
            const oracle = new OpensslOracle({ runner });

            const err = await rejectionOf(oracle.encryptBlock(key, plaintext), OracleOutputMalformed);
            expect(err.actualLength).to.equal(length);
            expect(err.message).to.equal(`oracle returned ${length} bytes, expected exactly 16`);
        }
    });
});

describe('Oracle selection', () => {
    it('should build the configured backend', async () => {
        expect(createOracle({ oracle: 'noble', opensslPath: 'openssl', timeout: null })).to.be.instanceOf(NobleOracle);

        const { runner, calls } = fakeRunner(() => exited(new Uint8Array(16)));
        const oracle = createOracle({ oracle: 'openssl', opensslPath: '/usr/local/bin/openssl', timeout: 2.5 }, runner);
        expect(oracle.name).to.equal('openssl');

        await oracle.encryptBlock(key, plaintext);
        expect(calls[0].command).to.equal('/usr/local/bin/openssl');
        expect(calls[0].options.timeoutMs).to.equal(2500);
    });

    it('should round fractional timeouts up to whole milliseconds', async () => {
        const { runner, calls } = fakeRunner(() => exited(new Uint8Array(16)));
        const oracle = createOracle({ oracle: 'openssl', opensslPath: 'openssl', timeout: 1.0001 }, runner);

        await oracle.encryptBlock(key, plaintext);
        expect(calls[0].options.timeoutMs).to.equal(1001);
    });
});
