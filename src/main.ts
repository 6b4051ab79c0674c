import { parseArgs } from 'node:util';
import { loadConverterConfig, type ConfigOverrides } from './config.js';
import { runConversion } from './services/menu-converter.js';
import { describeError } from './utils/describe-error.js';
import { createLogger, type LogSink } from './utils/logger.js';

export const USAGE = `Usage: menu-pos-export [options]

Convert markdown menu content into Loyverse and Odoo POS data.

Options:
  -c, --content-dir <dir>  menu content directory (default: content)
  -d, --data-dir <dir>     data directory for the mapping file and outputs (default: data)
  -v, --verbose            verbose output
  -h, --help               show this help
`;

export type CliArgs = {
  overrides: ConfigOverrides;
  help: boolean;
};

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      'content-dir': { type: 'string', short: 'c' },
      'data-dir': { type: 'string', short: 'd' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    overrides: {
      contentDir: values['content-dir'],
      dataDir: values['data-dir'],
      verbose: values.verbose,
    },
    help: values.help ?? false,
  };
}

export async function main(
  argv: string[],
  sink: LogSink = console,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    sink.error(describeError(error));
    sink.error(USAGE);
    return 2;
  }

  if (args.help) {
    sink.log(USAGE);
    return 0;
  }

  try {
    const config = loadConverterConfig(args.overrides, env);
    const logger = createLogger({ verbose: config.verbose, sink });
    await runConversion(config, logger);
    return 0;
  } catch (error) {
    createLogger({ sink }).error(describeError(error));
    return 1;
  }
}
