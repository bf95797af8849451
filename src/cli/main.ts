#!/usr/bin/env node

/**
 * display-bootstrap CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerDetectBrowserCommand,
  registerEnvCommand,
  registerRunCommand,
} from './run.js';

const program = new Command();

program
  .name('display-bootstrap')
  .description(
    'Bring up a virtual display, confirm the browser, then hand off to an application process.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerEnvCommand(program);
registerDetectBrowserCommand(program);

await program.parseAsync();
