#!/usr/bin/env node
// CLI entry point for genotype-concordance
// Loads .env before the config module is imported, since config is built at import time

import { projectRoot } from './config/registry/parsers.js';
import { loadEnv } from './config/env.js';

async function main(): Promise<void> {
  loadEnv(projectRoot);

  const { runCli } = await import('./cli/index.js');
  await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
