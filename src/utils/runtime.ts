import type { Logger } from 'pino';
import type { Dispatcher } from 'undici';
import type { ApiClientOptions } from './api';
import { DEFAULT_TIMEOUT_SECONDS, type Settings } from './config';
import type { LoggerHandle } from './logger';

/**
 * Collaborators the dispatcher is built from. `cli.ts` supplies the real ones;
 * tests substitute a mock connection pool and a silent logger.
 */
export interface CliDeps {
  /** Memoized settings getter. */
  settings: () => Settings;
  setupLogger: (settings: Settings) => LoggerHandle;
  /** Connection pool factory; each client owns and closes what it gets. */
  dispatcher?: () => Dispatcher;
  /** Interrupt signal; once aborted the invocation ends with exit code 130. */
  signal?: AbortSignal;
}

/** Global options shared by every subcommand. */
export type GlobalOptions = {
  baseUrl?: string;
  timeout?: number;
};

export interface Runtime {
  readonly logger: Logger;
  /** Options for a new client, each call with a fresh connection pool. */
  clientOptions(): ApiClientOptions;
}

/**
 * Per-invocation state shared between the program hooks and command actions.
 */
export class CommandContext {
  private resolved: { runtime: Runtime; logs: LoggerHandle } | undefined;

  constructor(private readonly deps: CliDeps) {}

  get signal(): AbortSignal | undefined {
    return this.deps.signal;
  }

  get aborted(): boolean {
    return this.deps.signal?.aborted ?? false;
  }

  /**
   * Resolve settings, configure logging and fix the client options. Runs once,
   * before the first action.
   */
  resolve(options: GlobalOptions): Runtime {
    if (this.resolved) return this.resolved.runtime;

    const settings = this.deps.settings();
    const logs = this.deps.setupLogger(settings);
    const logger = logs.logger;
    const baseUrl = options.baseUrl ?? settings.baseUrl;
    const timeoutSeconds = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    const { dispatcher, signal } = this.deps;

    logger.info('Starting httpprobe');
    logger.debug({ env: settings.environment, baseUrl, timeoutSeconds }, 'Settings resolved');

    const runtime: Runtime = {
      logger,
      clientOptions: () => ({
        baseUrl,
        timeoutSeconds,
        logger,
        ...(dispatcher ? { dispatcher: dispatcher() } : {}),
        ...(signal ? { signal } : {}),
      }),
    };
    this.resolved = { runtime, logs };
    return runtime;
  }

  runtime(): Runtime {
    if (!this.resolved) {
      throw new Error('Runtime requested before the program resolved its settings');
    }
    return this.resolved.runtime;
  }

  get logger(): Logger | undefined {
    return this.resolved?.runtime.logger;
  }

  /** Close the log file, if one was opened. */
  async dispose(): Promise<void> {
    const logs = this.resolved?.logs;
    this.resolved = undefined;
    await logs?.close();
  }
}
