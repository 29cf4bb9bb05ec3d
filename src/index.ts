#!/usr/bin/env node
/**
 * diff-trim - Token-budget preprocessing for unified diffs
 * CLI Entry Point
 */

// Global error handlers - must be set up first to catch any errors during startup
process.on('uncaughtException', (error, origin) => {
  console.error(`[DiffTrim] Fatal: Uncaught exception from ${origin}:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[DiffTrim] Fatal: Unhandled promise rejection:', reason);
  process.exit(1);
});

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { runCli } from './cli/run.js';

/**
 * Read all of stdin as UTF-8
 */
async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return '';
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Main CLI function
 */
export async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    readStdin,
    readFile: (path) => readFile(path, 'utf-8'),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
    isTTY: process.stderr.isTTY ?? false,
  });
}

// Run CLI
main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[DiffTrim] Fatal error:', err);
    process.exit(1);
  });
