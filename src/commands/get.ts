import { Command } from 'commander';
import { withApiClient } from '../utils/api';
import { ParameterFormatError, RequestError } from '../utils/errors';
import { failure, print } from '../utils/output';
import { parseParams, type RequestParams } from '../utils/params';
import type { CommandContext } from '../utils/runtime';

export function getCommand(context: CommandContext): Command {
  return new Command('get')
    .description(
      'Send GET <base-url>/get with query parameters and print the JSON response.\n\n' +
        'PARAMETERS: each --params value is KEY=VALUE, split on the first "=".\n' +
        '  Values are typed in this order: true/false (any case) -> boolean,\n' +
        '  digits -> integer, digits with one "." -> number, otherwise string.\n' +
        '  A repeated key keeps its last value.\n\n' +
        'EXAMPLES:\n' +
        '  httpprobe get --params q=search --params limit=10\n' +
        '  httpprobe get --params debug=true ratio=0.5\n\n' +
        'Exit code 0 on success, 1 on a malformed parameter or a failed request.'
    )
    .option('-p, --params <pairs...>', 'query parameter as KEY=VALUE (repeatable)')
    .action(async (options: { params?: string[] }, cmd: Command) => {
      const { logger, clientOptions } = context.runtime();

      let params: RequestParams;
      try {
        params = parseParams(options.params);
      } catch (err) {
        if (!(err instanceof ParameterFormatError)) throw err;
        logger.error(`Parameter parsing error: ${err.message}`);
        print(failure(err.message));
        cmd.error('', { exitCode: 1 });
      }

      logger.info({ params }, 'Executing get command');
      try {
        const data = await withApiClient(clientOptions(), (client) => client.getWithParams(params));
        print(data);
      } catch (err) {
        context.signal?.throwIfAborted();
        if (!(err instanceof RequestError)) throw err;
        logger.error({ err }, 'Get command failed');
        print(failure(err.message));
        cmd.error('', { exitCode: 1 });
      }
    });
}
