#!/usr/bin/env node

/**
 * ffmake CLI entry point
 *
 * Turns Makefile.config.json into a Makefile of ffmpeg commands.
 */

import dotenv from 'dotenv';
import { parseArgs, USAGE } from './cli.js';
import { run } from './index.js';

dotenv.config();

async function main() {
  const cliOptions = parseArgs(process.argv.slice(2));
  if (cliOptions.help) {
    console.log(USAGE);
    return;
  }
  await run({ configFile: cliOptions.configFile });
}

main().catch((error) => {
  console.error('❌ Error:', error);
  process.exit(1);
});
