#!/usr/bin/env node
import { runWorker } from './worker';

runWorker(process.argv, { stdout: (line) => process.stdout.write(`${line}\n`) })
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
    });
