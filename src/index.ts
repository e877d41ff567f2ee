#!/usr/bin/env node

import { runCli } from './cli.js';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
