#!/usr/bin/env node
// CLI entry point for fotoreport.
// .env is loaded before config is imported: the config singleton reads
// process.env once, at import time.

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadEnv } from './config/env.js';

process.env.DOTENV_CONFIG_QUIET = 'true';

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..');
loadEnv(projectRoot);

const { runCli } = await import('./cli/index.js');
await runCli(process.argv.slice(2));
