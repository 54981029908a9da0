/**
 * CLI argument parsing utilities
 */
import { DEFAULT_CONFIG_FILE } from './config.js';

export interface CliOptions {
  configFile: string;
  help: boolean;
}

export const USAGE = `Usage: ffmake [-c|--config <path>] [-h|--help]

Options:
  -c, --config  Path to configuration file (JSON format). Default: ${DEFAULT_CONFIG_FILE}
  -h, --help    Show this message`;

/**
 * Parse command line arguments (without the node and script entries)
 */
export const parseArgs = (args: string[]): CliOptions => {
  const options: CliOptions = {
    configFile: DEFAULT_CONFIG_FILE,
    help: args.includes('--help') || args.includes('-h'),
  };

  args.forEach((arg, i) => {
    const nextArg = args[i + 1];

    if ((arg === '--config' || arg === '-c') && nextArg) {
      options.configFile = nextArg;
    } else if (arg.startsWith('--config=')) {
      options.configFile = arg.slice('--config='.length);
    }
  });

  return options;
};
