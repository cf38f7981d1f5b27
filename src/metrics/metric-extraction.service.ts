import { Injectable, Logger } from '@nestjs/common';
import { DeviceQueryError } from '../device/interfaces/device-query.interface';
import { IngestionError } from '../sender/interfaces/ingestion.interface';
import { ZabbixSenderService } from '../sender/zabbix-sender.service';
import { extractEnergyValue } from './energy-parser';
import {
  MetricDefinition,
  MetricFailureCode,
  MetricOutcome,
  MetricRequest,
} from './interfaces/metric-definition.interface';
import { buildMetricRegistry } from './metric-catalog';
import { QueryContext } from './query-context';
import { applyTransform, parseSystemInfo } from './sysinfo-parser';

/**
 * MetricExtractionService - reads one metric and forwards it
 *
 * For every request:
 * 1. Validate the request (name, device, Zabbix server, Zabbix host)
 * 2. Resolve the metric definition from the run's registry
 * 3. Read the value from the cached energy or system info reading
 * 4. Send it to Zabbix under `<namespace>[<alias or name>]`
 *
 * Failures are returned as outcomes with a code, never thrown, so the run
 * loop can keep going and report them all at the end.
 */
@Injectable()
export class MetricExtractionService {
  private readonly logger = new Logger(MetricExtractionService.name);

  constructor(private readonly sender: ZabbixSenderService) {}

  async gatherValue(
    request: MetricRequest,
    context: QueryContext,
    registry: Map<string, MetricDefinition> = buildMetricRegistry(),
  ): Promise<MetricOutcome> {
    const invalid = this.validateRequest(request);
    if (invalid) {
      return invalid;
    }

    const { metricName } = request;
    const definition = registry.get(metricName);
    if (!definition) {
      return this.fail(
        metricName,
        MetricFailureCode.UNKNOWN_METRIC,
        `Unknown item '${metricName}'`,
      );
    }

    let value: string;
    try {
      value = await this.extract(definition, context);
    } catch (error) {
      if (error instanceof DeviceQueryError) {
        return this.fail(
          metricName,
          MetricFailureCode.DEVICE_QUERY_FAILED,
          error.message,
        );
      }
      throw error;
    }

    const itemKey = request.displayAlias || metricName;
    try {
      await this.sender.send(
        { key: itemKey, value },
        { server: request.ingestTarget, hostLabel: request.ingestHostLabel },
        request.verbose,
      );
    } catch (error) {
      if (error instanceof IngestionError) {
        return this.fail(
          metricName,
          MetricFailureCode.INGESTION_FAILED,
          error.message,
        );
      }
      throw error;
    }

    this.logger.debug(`Sent ${this.sender.itemKey(itemKey)} = '${value}'`);
    return { ok: true, metricName, itemKey, value };
  }

  /**
   * Read the raw value of a metric from the device readings
   */
  async extract(
    definition: MetricDefinition,
    context: QueryContext,
  ): Promise<string> {
    const { source } = definition;
    switch (source.kind) {
      case 'energy':
        return extractEnergyValue(await context.energy(), source.label);
      case 'sysinfo': {
        const payload = parseSystemInfo(
          await context.systemInfo(),
          context.lineBudget,
        );
        if (!payload) {
          this.logger.warn(
            `System info of ${context.deviceHost} is not parseable, forwarding empty ${definition.name}`,
          );
          return '';
        }
        return applyTransform(
          source.transform,
          payload[source.field],
          new Date(),
        );
      }
      default: {
        const unhandled: never = source;
        throw new Error(
          `Unhandled metric source: ${JSON.stringify(unhandled)}`,
        );
      }
    }
  }

  private validateRequest(request: MetricRequest): MetricOutcome | null {
    const name = request.metricName || '(none)';
    if (!request.metricName) {
      return this.fail(
        name,
        MetricFailureCode.MISSING_METRIC_NAME,
        'Item not given',
      );
    }
    if (!request.deviceHost) {
      return this.fail(
        name,
        MetricFailureCode.MISSING_DEVICE_HOST,
        'Smartplug host not given',
      );
    }
    if (!request.ingestTarget) {
      return this.fail(
        name,
        MetricFailureCode.MISSING_INGEST_TARGET,
        'Zabbix server not given',
      );
    }
    if (!request.ingestHostLabel) {
      return this.fail(
        name,
        MetricFailureCode.MISSING_INGEST_HOST_LABEL,
        'Zabbix host not given',
      );
    }
    return null;
  }

  private fail(
    metricName: string,
    code: MetricFailureCode,
    reason: string,
  ): MetricOutcome {
    this.logger.warn(`Item ${metricName} failed (code ${code}): ${reason}`);
    return { ok: false, metricName, code, reason };
  }
}
