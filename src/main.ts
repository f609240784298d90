#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';

import { createTimelapseApp } from './bootstrap.js';
import { TimelapseWizard } from './cli/timelapse-wizard.js';
import { loadConfig } from './shared/config/env.js';
import { createChildLogger, setLogLevel } from './shared/logger/pino.js';

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = createTimelapseApp(config);
  const readline = createInterface({ input: process.stdin, output: process.stdout });

  try {
    const wizard = new TimelapseWizard({
      prompter: { ask: (question) => readline.question(question) },
      runner: app.handler,
      directoryExists: (directory) => app.images.directoryExists(directory),
      out: process.stdout,
    });
    return await wizard.run();
  } finally {
    readline.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    createChildLogger({ module: 'main' }).fatal({ error }, 'stillmotion crashed');
    console.error('Failed to create timelapse', error);
    process.exitCode = 1;
  });
