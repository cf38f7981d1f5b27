import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandRunner } from '../commands/command-runner.service';
import { SmartplugEnv } from '../config/smartplug.config';
import { extractHardwareModel } from './hardware-model';
import { ModelCatalogService } from './model-catalog.service';
import { QueryContext } from './query-context';

export const PreflightFailureCode = {
  MISSING_BINARY: 1,
  UNRESOLVED_MODEL: 2,
  NO_LINE_BUDGET: 3,
  MALFORMED_EXTENSION: 4,
} as const;

export type PreflightFailureCode =
  (typeof PreflightFailureCode)[keyof typeof PreflightFailureCode];

/**
 * Raised by the preflight gate. Nothing has been sent when this is thrown.
 */
export class PreflightError extends Error {
  constructor(
    public readonly code: PreflightFailureCode,
    message: string,
  ) {
    super(message);
    this.name = 'PreflightError';
  }
}

/**
 * SmartplugPreflightService - checks run before any metric is touched
 *
 * 1. kasa and zabbix_sender are executable
 * 2. the hardware model can be read from sysinfo (the reading stays cached
 *    in the context for the metrics that follow)
 * 3. the model has a line budget
 * 4. every model extension entry is well formed
 */
@Injectable()
export class SmartplugPreflightService {
  private readonly logger = new Logger(SmartplugPreflightService.name);
  private readonly requiredBinaries: string[];

  constructor(
    private readonly commandRunner: CommandRunner,
    private readonly modelCatalog: ModelCatalogService,
    configService: ConfigService<SmartplugEnv, true>,
  ) {
    this.requiredBinaries = [
      configService.get('KASA_BIN', { infer: true }),
      configService.get('ZABBIX_SENDER_BIN', { infer: true }),
    ];
  }

  /**
   * Fill the context's hardware model and line budget.
   *
   * @throws PreflightError on the first failing check
   */
  async initialize(context: QueryContext): Promise<void> {
    await this.checkBinaries();

    context.hardwareModel = await this.resolveHardwareModel(context);

    const lineBudget = this.modelCatalog.lineBudgetFor(context.hardwareModel);
    if (lineBudget === undefined) {
      throw new PreflightError(
        PreflightFailureCode.NO_LINE_BUDGET,
        `Hardware model '${context.hardwareModel}' is not supported (known: ${Object.keys(this.modelCatalog.getCatalog().lineBudgets).join(', ')})`,
      );
    }
    context.lineBudget = lineBudget;

    const malformed = this.modelCatalog.findMalformedExtensions();
    if (malformed.length > 0) {
      for (const { model, entry } of malformed) {
        this.logger.error(
          `Extension definition for ${model} is malformed: '${entry}'`,
        );
      }
      throw new PreflightError(
        PreflightFailureCode.MALFORMED_EXTENSION,
        `${malformed.length} malformed extension definition(s) in the model catalog`,
      );
    }

    this.logger.log(
      `Detected ${context.hardwareModel} at ${context.deviceHost} (payload: last ${lineBudget} lines)`,
    );
  }

  private async checkBinaries(): Promise<void> {
    for (const binary of this.requiredBinaries) {
      if (!(await this.commandRunner.isAvailable(binary))) {
        throw new PreflightError(
          PreflightFailureCode.MISSING_BINARY,
          `Binary '${binary}' is not installed, but required`,
        );
      }
    }
  }

  private async resolveHardwareModel(context: QueryContext): Promise<string> {
    let systemInfo: string;
    try {
      systemInfo = await context.systemInfo();
    } catch (error) {
      throw new PreflightError(
        PreflightFailureCode.UNRESOLVED_MODEL,
        `Cannot query system info: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const hardwareModel = extractHardwareModel(systemInfo);
    if (hardwareModel === '') {
      throw new PreflightError(
        PreflightFailureCode.UNRESOLVED_MODEL,
        `No hardware model found in system info of ${context.deviceHost}`,
      );
    }
    return hardwareModel;
  }
}
