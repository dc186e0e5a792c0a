#!/usr/bin/env node

import { runCli } from './cli';

async function main() {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    console.error('Failed to start:', error);
    process.exit(1);
  }
}

void main();
