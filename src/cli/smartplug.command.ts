import { Injectable, Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  isVerboseEnvironment,
  SmartplugEnv,
} from '../config/smartplug.config';
import {
  RunReport,
  SmartplugRunService,
} from '../metrics/smartplug-run.service';
import { parseCliArguments, USAGE } from './cli-arguments';
import { ExitCode } from './exit-codes';

export const DEFAULT_LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log'];
export const VERBOSE_LOG_LEVELS: LogLevel[] = [
  ...DEFAULT_LOG_LEVELS,
  'debug',
  'verbose',
];

/**
 * SmartplugCommand - the command line entry point
 *
 * ParseArgs -> Validate -> run (Init, catalog, extensions) -> exit code.
 * Command line flags win over the environment, so the same binary serves
 * cron jobs (flags) and the container entrypoint (environment).
 */
@Injectable()
export class SmartplugCommand {
  private readonly logger = new Logger(SmartplugCommand.name);

  constructor(
    private readonly configService: ConfigService<SmartplugEnv, true>,
    private readonly runService: SmartplugRunService,
  ) {}

  async execute(argv: string[]): Promise<ExitCode> {
    const parsed = parseCliArguments(argv);

    if (parsed.kind === 'error') {
      this.logger.error(
        `Parsing commandline options failed: ${parsed.message}`,
      );
      this.printUsage();
      return ExitCode.ARGUMENTS_INVALID;
    }
    if (parsed.kind === 'help') {
      this.printUsage();
      return ExitCode.SUCCESS;
    }

    const { flags } = parsed;
    const deviceHost =
      flags.host || this.configService.get('SMARTPLUG_HOST', { infer: true });

    // bare invocation without an environment to fall back on
    if (parsed.empty && !deviceHost) {
      this.printUsage();
      return ExitCode.SUCCESS;
    }

    const verbose =
      flags.verbose ||
      isVerboseEnvironment({
        VERBOSE: this.configService.get('VERBOSE', { infer: true }),
      });
    if (verbose) {
      Logger.overrideLogger(VERBOSE_LOG_LEVELS);
    }

    if (!deviceHost) {
      this.logger.error(
        'TP-Link Smartplug hostname or IP not given, although required! Use --host <value> or -n <value>.',
      );
      return ExitCode.MISSING_DEVICE_HOST;
    }

    const zabbixServer =
      flags.zabbixServer ||
      this.configService.get('ZBX_SERVER', { infer: true });
    if (!zabbixServer) {
      this.logger.error(
        'Zabbix server hostname or IP not given, although required! Use --zabbix-server <value> or -z <value>.',
      );
      return ExitCode.MISSING_ZABBIX_SERVER;
    }

    let zabbixHost =
      flags.zabbixHost || this.configService.get('ZBX_HOST', { infer: true });
    if (!zabbixHost) {
      this.logger.warn(
        `Name of the Zabbix host has not been given, using the smartplug host ('${deviceHost}')`,
      );
      zabbixHost = deviceHost;
    }

    const report = await this.runService.run({
      deviceHost,
      ingestTarget: zabbixServer,
      ingestHostLabel: zabbixHost,
      verbose,
    });
    return this.exitCodeFor(report);
  }

  private exitCodeFor(report: RunReport): ExitCode {
    switch (report.status) {
      case 'success':
        return ExitCode.SUCCESS;
      case 'init-failed':
        return ExitCode.INIT_FAILED;
      case 'metrics-failed':
        return ExitCode.ITEMS_FAILED;
    }
  }

  private printUsage(): void {
    process.stdout.write(`${USAGE}\n`);
  }
}
