#!/usr/bin/env tsx
import { config } from 'dotenv';

config({ path: ['.env', 'config.env'] });

// loaded after dotenv so LOG_LEVEL and friends are in place when the logger starts
const { runCli } = await import('./lib/cli/index.js');

process.exit(await runCli(process.argv.slice(2)));
