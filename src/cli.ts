#!/usr/bin/env node
import chalk from 'chalk';

import {loadConfig} from './lib/config';
import {parseArguments, runFile} from './lib/runner';

async function main(argv: string[]): Promise<void> {
    const args = parseArguments(argv);
    await runFile(args, loadConfig());
}

main(process.argv.slice(2))
    .catch((err: Error) => {
        console.error(chalk.red(err.message));
        process.exitCode = 1;
    });
