#!/usr/bin/env node

import 'dotenv/config';
import React from 'react';
import { render } from 'ink';
import { Wizard } from './wizard.js';
import { restoreConsole } from './utils/consoleCapture.js';
import { loadConfig, ConfigValidationError, type Config } from './config/index.js';
import { describeError } from './utils/logger.js';
import { getCacheStore } from './utils/reportCache/index.js';
import { startDailySweep } from './utils/reportCache/sweep.js';

process.on('exit', restoreConsole);
process.on('SIGINT', () => {
  restoreConsole();
  process.exit(130);
});
process.on('uncaughtException', (error) => {
  restoreConsole();
  throw error;
});

// Load and validate configuration before starting the application
function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    restoreConsole();
    if (error instanceof ConfigValidationError) {
      console.error('\n' + error.message + '\n');
      process.exit(1);
    }
    throw error;
  }
}

async function startSweepOrExit(intervalHours: number): Promise<() => void> {
  try {
    const store = await getCacheStore();
    return startDailySweep(store, { intervalMs: intervalHours * 60 * 60 * 1000 });
  } catch (error) {
    console.error(`\nCould not open the report cache: ${describeError(error)}\n`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const stopSweep = await startSweepOrExit(config.sweep.intervalHours);

const initialCountry = process.argv[2];
const app = render(<Wizard {...(initialCountry ? { initialCountry } : {})} />);

await app.waitUntilExit();
stopSweep();
