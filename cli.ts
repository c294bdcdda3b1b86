#!/usr/bin/env node

import { CliProgram } from './cli-program';

const program = CliProgram.Create();

if (process.argv.length < 3) {
    program.help();
}

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
