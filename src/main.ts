#!/usr/bin/env node
import 'dotenv/config';
import { main } from './rescribe';

main().catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
