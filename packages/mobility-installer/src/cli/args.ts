/**
 * @fileoverview Command-line arguments for paperkit-mobility-install
 */

import { parseArgs } from 'util';
import { ConfigError, errorMessage } from '@paperkit/core';

export const COMMAND_NAME = 'paperkit-mobility-install';

export interface CliOptions {
  token?: string;
  settingsPath?: string;
  packageUrl?: string;
  appPath?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

function parse(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        settings: { type: 'string' },
        'package-url': { type: 'string' },
        'app-path': { type: 'string' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new ConfigError('Invalid arguments', [errorMessage(error)]);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parse(argv);
  if (positionals.length > 1) {
    throw new ConfigError('Invalid arguments', [`expected one token, got ${positionals.length} arguments`]);
  }

  return {
    token: positionals[0],
    settingsPath: values.settings,
    packageUrl: values['package-url'],
    appPath: values['app-path'],
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

export function usage(): string {
  return `
Install the Mobility Print client and its print queues, unattended.

USAGE:
  ${COMMAND_NAME} <token> [options]

ARGUMENTS:
  <token>                 Provisioning token handed to the client

OPTIONS:
  --settings <path>       Settings file (default: ~/.paperkit/settings.json)
  --package-url <url>     Link that redirects to the latest client package
  --app-path <path>       Client executable that marks the app as installed
  -v, --verbose           Log debug detail to stderr
  -h, --help              Show this help message
  --version               Show version number

EXIT CODES:
  0  client and at least one print queue present
  1  install failed
  2  usage error or unsupported platform
`;
}
