#!/usr/bin/env node

/**
 * doxygen-md CLI
 *
 * Usage:
 *   doxygen-md ./xml --outdir ./docs
 *   doxygen-md ./xml/classMath.xml
 *   cat classMath.xml | doxygen-md
 */

import { runCli } from '../cli';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

// Run CLI
runCli(process.argv.slice(2), {
  stdout: text => process.stdout.write(text),
  readStdin,
  env: process.env,
})
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
