#!/usr/bin/env node

import { Command } from 'commander';
import * as commands from './commands';
import { loadConfig, saveConfig } from './config';
import { STDOUT_SINK } from './generator';
import { ALL_ORACLES } from './types';

interface ProgramOptions {
    oracle?: string;
    openssl?: string;
    timeout?: string;
}

function print(object: unknown) {
    console.log(JSON.stringify(object, null, 4));
}

async function main() {
    const config = loadConfig();
    const program = new Command();

    program
        .version('0.1.0')
        .name('aes-vectors')
        .description('generate AES-128-ECB single-block test vectors')
        .argument('[count]', `number of vectors, known-answer vector included (default: ${config.count})`)
        .argument('[output]', `output file, "${STDOUT_SINK}" for stdout (default: ${config.output})`)
        .option('--oracle <backend>', `encryption oracle: ${ALL_ORACLES.join(' | ')} (default: ${config.oracle})`)
        .option('--openssl <path>', `openssl binary (default: ${config.opensslPath})`)
        .option('--timeout <sec>', 'kill an oracle call that runs longer than this')
        .action(async (count?: string, output?: string) => {
            const options = program.opts<ProgramOptions>();
            const resolved = commands.resolveConfig(config, { count, output, ...options });
            const report = await commands.generate(resolved);
            // keep stdout clean when the vectors themselves go there
            const log = report.output === STDOUT_SINK ? console.error : console.info;
            log(`Wrote ${report.count} vectors to ${report.output}`);
        });

    const configCommand = new Command('config');

    configCommand
        .description('print the resolved configuration')
        .action(() => {
            print(commands.resolveConfig(config, program.opts<ProgramOptions>()));
        })
        .command('save')
        .description('write the resolved configuration to the config file')
        .action(() => {
            const resolved = commands.resolveConfig(config, program.opts<ProgramOptions>());
            console.info(`Saved to ${saveConfig(resolved)}`);
            print(resolved);
        });

    program.addCommand(configCommand);

    await program.parseAsync(process.argv);
}

main().catch((err: Error) => {
    console.error('Error:', err.message || err);
    process.exitCode = 1;
});
