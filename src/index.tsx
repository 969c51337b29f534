#!/usr/bin/env node

import React from 'react';
import { render } from 'ink';
import { App } from './app.js';
import { parseCliArgs, USAGE, type CliArgs } from './cli-args.js';

function readArgs(): CliArgs {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
    process.exit(1);
  }
}

const args = readArgs();

if (process.stdout.isTTY) {
  process.stdout.write('\x1B[2J\x1B[H');
}

render(<App args={args} />);
