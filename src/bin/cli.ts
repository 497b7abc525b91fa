#!/usr/bin/env node

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { runCli } from './program.js';

async function readVersion(): Promise<string> {
    const raw = await readFile(new URL('../../package.json', import.meta.url), 'utf-8');
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
    }
    return '0.0.0';
}

async function main(): Promise<void> {
    process.exitCode = await runCli(process.argv, undefined, await readVersion());
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
