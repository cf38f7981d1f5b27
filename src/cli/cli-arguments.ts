import { parseArgs } from 'node:util';

export interface CliFlags {
  host?: string;
  zabbixServer?: string;
  zabbixHost?: string;
  verbose: boolean;
}

export type CliParseResult =
  | { kind: 'help' }
  | { kind: 'flags'; flags: CliFlags; empty: boolean }
  | { kind: 'error'; message: string };

export const USAGE = [
  'Usage: smartplug-zabbix [options]',
  'Available command line options:',
  '--zabbix-server OR -z: IP address or hostname of a Zabbix server to send the values to',
  '--host OR -n         : IP address or hostname of a TPLink Smartplug to query',
  '--zabbix-host OR -a  : Name of the TPLink Smartplug host object in Zabbix',
  '--verbose OR -v      : Verbose output',
  '--help OR -h         : Print this message',
  '',
  'Environment: SMARTPLUG_HOST, ZBX_SERVER, ZBX_HOST and VERBOSE may be used',
  'instead of the options above; options take precedence.',
].join('\n');

/**
 * Parse the command line. Unknown options and stray arguments are errors.
 */
export function parseCliArguments(argv: string[]): CliParseResult {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        host: { type: 'string', short: 'n' },
        'zabbix-server': { type: 'string', short: 'z' },
        'zabbix-host': { type: 'string', short: 'a' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });

    if (values.help) {
      return { kind: 'help' };
    }

    return {
      kind: 'flags',
      empty: argv.length === 0,
      flags: {
        host: values.host,
        zabbixServer: values['zabbix-server'],
        zabbixHost: values['zabbix-host'],
        verbose: values.verbose ?? false,
      },
    };
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
