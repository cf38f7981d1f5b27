import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CommandResult,
  CommandRunner,
} from '../commands/command-runner.service';
import { SmartplugEnv } from '../config/smartplug.config';
import {
  IngestionError,
  IngestionItem,
  IngestionTarget,
} from './interfaces/ingestion.interface';

/**
 * ZabbixSenderService - ingestion capability backed by `zabbix_sender`
 *
 * Each item is piped to `zabbix_sender -i - -s <host> -z <server>` as a
 * single input line. In verbose mode `-vv` is added and whatever the
 * sender prints is surfaced through the logger; otherwise it is dropped.
 */
@Injectable()
export class ZabbixSenderService {
  private readonly logger = new Logger(ZabbixSenderService.name);
  private readonly binary: string;
  private readonly namespace: string;

  constructor(
    private readonly commandRunner: CommandRunner,
    configService: ConfigService<SmartplugEnv, true>,
  ) {
    this.binary = configService.get('ZABBIX_SENDER_BIN', { infer: true });
    this.namespace = configService.get('ZBX_ITEM_NAMESPACE', { infer: true });
  }

  /**
   * Item key as Zabbix sees it, e.g. `tplink_smartplug[voltage_mv]`
   */
  itemKey(key: string): string {
    return `${this.namespace}[${key}]`;
  }

  /**
   * Render the sender input line for one item
   */
  formatLine(item: IngestionItem): string {
    return `- ${this.itemKey(item.key)} ${item.value}\n`;
  }

  /**
   * Send one item. Resolves once zabbix_sender has exited successfully.
   *
   * @throws IngestionError if the sender cannot be run or exits non-zero
   */
  async send(
    item: IngestionItem,
    target: IngestionTarget,
    verbose: boolean,
  ): Promise<void> {
    const args = ['-i', '-', '-s', target.hostLabel, '-z', target.server];
    if (verbose) {
      args.push('-vv');
    }

    let result: CommandResult;
    try {
      result = await this.commandRunner.run(this.binary, args, {
        input: this.formatLine(item),
      });
    } catch (error) {
      throw new IngestionError(
        this.itemKey(item.key),
        `could not run ${this.binary}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (verbose) {
      this.surfaceOutput(result);
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      throw new IngestionError(
        this.itemKey(item.key),
        `${this.binary} exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
        result.exitCode,
      );
    }
  }

  private surfaceOutput(result: CommandResult): void {
    const lines = `${result.stdout}\n${result.stderr}`
      .split(/\r?\n/)
      .filter((line) => line.trim() !== '');
    for (const line of lines) {
      this.logger.log(`${this.binary}: ${line}`);
    }
  }
}
