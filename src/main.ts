#!/usr/bin/env node
// main.ts - command-line entry point
import 'dotenv/config'; // Load .env file variables before the configuration is read
import { runCli } from './cli';
import { shutdownLogging } from './lib/logger';

const main = async (): Promise<void> => {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } finally {
    await shutdownLogging();
  }
};

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  process.exitCode = 1;
});
