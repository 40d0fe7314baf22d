import { Command } from 'commander';
import { getCommand } from './commands/get';
import { pingCommand } from './commands/ping';
import {
  isCommanderError,
  isInformational,
  normalizeCommanderMessage,
  positiveIntOption,
  urlOption,
} from './utils/commander';
import { DEFAULT_TIMEOUT_SECONDS } from './utils/config';
import { CliError, describeError } from './utils/errors';
import { failure, print } from './utils/output';
import { CommandContext, type CliDeps, type GlobalOptions } from './utils/runtime';
import { VERSION } from './utils/version';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Build the root Commander program with global options and all subcommands.
 */
export function createProgram(context: CommandContext): Command {
  const program = new Command();

  program
    .name('httpprobe')
    .description(
      'Minimal HTTP client: connectivity checks and parameterized GET requests\n' +
        'against <base-url>/get, printed as JSON.\n\n' +
        'TYPICAL WORKFLOW:\n' +
        '  httpprobe ping                                  # 1. verify the API is reachable\n' +
        '  httpprobe get --params name=demo --params n=3   # 2. send query parameters\n\n' +
        'OUTPUT: one JSON document on stdout, 2-space indented. Failures print\n' +
        '  {"error": "..."}. Logs go to stderr and <LOG_DIR>/app.log.\n' +
        'EXIT CODES: 0 success, 1 failure or usage error, 130 interrupted.\n' +
        'ENV (or .env, case-insensitive): ENV, API_BASE_URL, API_KEY, LOG_LEVEL, LOG_DIR.'
    )
    .version(VERSION)
    .option('-u, --base-url <url>', 'API base URL (overrides API_BASE_URL)', urlOption)
    .option(
      '-t, --timeout <seconds>',
      `request timeout in seconds (default: ${DEFAULT_TIMEOUT_SECONDS})`,
      positiveIntOption
    )
    .hook('preAction', (_thisCommand, actionCommand) => {
      context.resolve(actionCommand.optsWithGlobals<GlobalOptions>());
    });

  // Show help when no subcommand given; error on unknown commands
  program.action(function (this: Command) {
    if (this.args.length > 0) {
      this.error(`unknown command '${this.args[0]}'`);
    }
    this.outputHelp();
    this.error('', { exitCode: EXIT_FAILURE });
  });

  program.addCommand(pingCommand(context)).addCommand(getCommand(context));

  return program;
}

// Recursively override Commander output handlers to keep error rendering centralized.
function configureCommander(command: Command): void {
  command.configureOutput({
    writeOut: (str) => process.stdout.write(str),
    writeErr: () => {
      // Suppress Commander default stderr. Failures are printed as JSON by runCli.
    },
  });
  command.exitOverride();
  for (const subcommand of command.commands) {
    configureCommander(subcommand);
  }
}

function report(context: CommandContext, err: unknown): number {
  if (context.aborted) {
    context.logger?.warn('Operation cancelled by user');
    process.stderr.write('\nOperation cancelled by user\n');
    return EXIT_INTERRUPTED;
  }

  if (isCommanderError(err)) {
    if (isInformational(err)) return EXIT_OK;
    const message = normalizeCommanderMessage(err.message);
    if (message.length > 0) {
      print(failure(message));
    }
    return err.exitCode || EXIT_FAILURE;
  }

  if (err instanceof CliError) {
    context.logger?.error({ err }, err.message);
    print(failure(err.message));
    return EXIT_FAILURE;
  }

  context.logger?.error({ err }, 'Unexpected error');
  print(failure(`Unexpected error: ${describeError(err)}`));
  return EXIT_FAILURE;
}

/**
 * Parse `argv` (user arguments only), run the selected command and map the
 * outcome to a process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const context = new CommandContext(deps);
  const program = createProgram(context);
  configureCommander(program);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return context.aborted ? report(context, undefined) : EXIT_OK;
  } catch (err) {
    return report(context, err);
  } finally {
    await context.dispose();
  }
}
