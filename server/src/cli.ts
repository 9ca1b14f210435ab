#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './program';

async function main(): Promise<void> {
    const program = createProgram();
    await program.parseAsync(process.argv);
}

main().catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[CLI] ${message}`);
    process.exitCode = 1;
});
