import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CommandResult,
  CommandRunner,
} from '../commands/command-runner.service';
import { SmartplugEnv } from '../config/smartplug.config';
import {
  DeviceQueryError,
  DeviceQueryKind,
  IDeviceQuery,
} from './interfaces/device-query.interface';

/**
 * KasaClient - device query capability backed by the `kasa` CLI
 *
 * Issues `kasa --type plug --host <host> <emeter|sysinfo>` and hands back
 * the raw output. Parsing is left to the metric extraction layer.
 */
@Injectable()
export class KasaClient implements IDeviceQuery {
  private readonly logger = new Logger(KasaClient.name);
  private readonly binary: string;

  constructor(
    private readonly commandRunner: CommandRunner,
    configService: ConfigService<SmartplugEnv, true>,
  ) {
    this.binary = configService.get('KASA_BIN', { infer: true });
  }

  queryEnergy(host: string): Promise<string> {
    return this.query('emeter', host);
  }

  querySystemInfo(host: string): Promise<string> {
    return this.query('sysinfo', host);
  }

  private async query(kind: DeviceQueryKind, host: string): Promise<string> {
    this.logger.debug(`Querying ${kind} from ${host}`);

    let result: CommandResult;
    try {
      result = await this.commandRunner.run(this.binary, [
        '--type',
        'plug',
        '--host',
        host,
        kind,
      ]);
    } catch (error) {
      throw new DeviceQueryError(
        kind,
        host,
        `could not run ${this.binary}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (result.exitCode !== 0) {
      throw new DeviceQueryError(
        kind,
        host,
        `${this.binary} exited with code ${result.exitCode}: ${result.stderr.trim()}`,
        result.exitCode,
      );
    }

    return result.stdout;
  }
}
