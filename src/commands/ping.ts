import { Command } from 'commander';
import { withApiClient } from '../utils/api';
import { print } from '../utils/output';
import type { CommandContext } from '../utils/runtime';

export function pingCommand(context: CommandContext): Command {
  return new Command('ping')
    .description(
      'Check connectivity to the API. Run this first.\n\n' +
        'Sends GET <base-url>/get and prints status, response headers, success and\n' +
        'a message. Connection failures are reported in the output, never thrown.\n\n' +
        'Exit code 0 on a 2xx response, 1 otherwise.'
    )
    .action(async (_options, cmd: Command) => {
      const { logger, clientOptions } = context.runtime();
      logger.info('Executing ping command');

      const result = await withApiClient(clientOptions(), (client) => client.ping());
      context.signal?.throwIfAborted();

      print(result);
      if (!result.success) {
        logger.warn(result.message);
        cmd.error('', { exitCode: 1 });
      }
    });
}
