#!/usr/bin/env node
import { runCli } from './index';
import { createSettingsProvider } from './utils/config';
import { setupLogger } from './utils/logger';

/**
 * CLI entrypoint: wire process signals and settings, then run the dispatcher.
 */
async function main(): Promise<number> {
  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  try {
    return await runCli(process.argv.slice(2), {
      settings: createSettingsProvider({ env: process.env, cwd: process.cwd() }),
      setupLogger: (settings) => setupLogger({ level: settings.logLevel, dir: settings.logDir }),
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.log(JSON.stringify({ error: `Unexpected error: ${String(err)}` }, null, 2));
    process.exitCode = 1;
  }
);
