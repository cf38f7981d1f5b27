import { Injectable, Logger } from '@nestjs/common';
import { KasaClient } from '../device/kasa.client';
import {
  MetricDefinition,
  MetricFailure,
  MetricOutcome,
  MetricRequest,
} from './interfaces/metric-definition.interface';
import { buildMetricRegistry, METRIC_CATALOG } from './metric-catalog';
import { MetricExtractionService } from './metric-extraction.service';
import { ModelCatalogService } from './model-catalog.service';
import { QueryContext } from './query-context';
import {
  PreflightError,
  PreflightFailureCode,
  SmartplugPreflightService,
} from './smartplug-preflight.service';

export interface RunOptions {
  deviceHost: string;
  ingestTarget: string;
  ingestHostLabel: string;
  verbose: boolean;
}

export type RunStatus = 'success' | 'init-failed' | 'metrics-failed';

/**
 * Summary of one run
 */
export interface RunReport {
  status: RunStatus;
  hardwareModel: string;
  /** Items accepted by zabbix_sender */
  sent: number;
  failures: MetricFailure[];
  /** Set when status is init-failed */
  preflightFailure?: { code: PreflightFailureCode; message: string };
  durationMs: number;
}

/**
 * SmartplugRunService - one complete pass over a device
 *
 * Init -> common catalog -> model extensions -> report. Every metric is
 * attempted exactly once; a failing metric is recorded and the loop moves
 * on. There are no retries, the job is simply started again by its
 * scheduler.
 */
@Injectable()
export class SmartplugRunService {
  private readonly logger = new Logger(SmartplugRunService.name);

  constructor(
    private readonly kasaClient: KasaClient,
    private readonly preflight: SmartplugPreflightService,
    private readonly extraction: MetricExtractionService,
    private readonly modelCatalog: ModelCatalogService,
  ) {}

  async run(options: RunOptions): Promise<RunReport> {
    const startTime = Date.now();
    const context = new QueryContext(options.deviceHost, this.kasaClient);
    const report: RunReport = {
      status: 'success',
      hardwareModel: '',
      sent: 0,
      failures: [],
      durationMs: 0,
    };

    try {
      await this.preflight.initialize(context);
    } catch (error) {
      if (!(error instanceof PreflightError)) {
        throw error;
      }
      this.logger.error(`Initialization failed: ${error.message}`);
      report.status = 'init-failed';
      report.preflightFailure = { code: error.code, message: error.message };
      report.durationMs = Date.now() - startTime;
      return report;
    }
    report.hardwareModel = context.hardwareModel;

    const extensions = this.modelCatalog.extensionFor(context.hardwareModel);
    const registry = buildMetricRegistry(extensions.map((item) => item.field));

    for (const definition of METRIC_CATALOG) {
      const outcome = await this.gather(
        definition.name,
        undefined,
        options,
        context,
        registry,
      );
      this.record(report, outcome);
    }

    for (const { field, alias } of extensions) {
      const outcome = await this.gather(field, alias, options, context, registry);
      this.record(report, outcome);
    }

    if (report.failures.length > 0) {
      report.status = 'metrics-failed';
      this.logger.error(
        'One or more items failed to either be retrieved from the smartplug or to be sent to the Zabbix server',
      );
      this.logger.error(
        `Gathered return codes: ${report.failures.map((failure) => failure.code).join(', ')}`,
      );
    }

    report.durationMs = Date.now() - startTime;
    this.logger.log(
      `Run complete: ${report.sent}/${report.sent + report.failures.length} items sent in ${report.durationMs}ms`,
    );
    return report;
  }

  private gather(
    metricName: string,
    displayAlias: string | undefined,
    options: RunOptions,
    context: QueryContext,
    registry: Map<string, MetricDefinition>,
  ): Promise<MetricOutcome> {
    const request: MetricRequest = {
      metricName,
      deviceHost: options.deviceHost,
      ingestTarget: options.ingestTarget,
      ingestHostLabel: options.ingestHostLabel,
      displayAlias,
      verbose: options.verbose,
    };
    return this.extraction.gatherValue(request, context, registry);
  }

  private record(report: RunReport, outcome: MetricOutcome): void {
    if (outcome.ok) {
      report.sent++;
    } else {
      report.failures.push({
        metricName: outcome.metricName,
        code: outcome.code,
        reason: outcome.reason,
      });
    }
  }
}
