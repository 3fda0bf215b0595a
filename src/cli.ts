#!/usr/bin/env node
/**
 * Entry point for termpages-demo.
 *
 * Usage:
 *   npx tsx src/cli.ts [--name <title>] [--stop] [--no-page-name]
 *
 * `a`/`d` or the arrow keys switch pages, a number followed by Enter runs
 * that element's command. Ctrl+C exits.
 */

import { parseArgs } from 'node:util';
import { buildDemoMenu } from './demo.js';
import { TerminalClosedError, TerminalInterruptedError } from './errors.js';
import { UI } from './ui.js';

// ---------- CLI argument parsing ----------

const { values } = parseArgs({
  options: {
    name: { type: 'string', short: 'n', default: 'termpages demo' },
    stop: { type: 'boolean', short: 's', default: false },
    'no-page-name': { type: 'boolean', default: false },
  },
  allowPositionals: false,
  strict: true,
});

// ---------- Bootstrap ----------

async function main(): Promise<void> {
  const ui = buildDemoMenu(new UI(values.name, { showCurrentPageName: !values['no-page-name'] }));
  try {
    await ui.loop({ stop: values.stop });
  } catch (err) {
    if (err instanceof TerminalInterruptedError) {
      process.exitCode = 130;
      return;
    }
    if (err instanceof TerminalClosedError) return;
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
