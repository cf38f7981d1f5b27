/**
 * Metric definitions - where each value comes from and how it is shaped
 *
 * A metric is either read from the energy reading (a human-readable line
 * found by its label) or from the system info dump (a field of the
 * pseudo-JSON payload, optionally post-processed).
 */

/** Line labels printed by `kasa emeter` */
export type EnergyLabel =
  | 'Voltage:'
  | 'Current:'
  | 'Power:'
  | 'Total consumption:';

/**
 * Post-processing applied to a system info field:
 * - none: value forwarded as rendered
 * - emptyAsToken: an empty string becomes the literal `empty`
 * - invertFlag: `1` and `0` are swapped (led_off reads as "LED on")
 * - nestedType: only the `type` member of a nested object is kept
 * - secondsAgoTimestamp: a duration in seconds becomes the absolute
 *   `dd.MM.yyyy HH:mm:ss` timestamp that many seconds ago
 */
export type SysinfoTransform =
  | 'none'
  | 'emptyAsToken'
  | 'invertFlag'
  | 'nestedType'
  | 'secondsAgoTimestamp';

export type MetricSource =
  | { kind: 'energy'; label: EnergyLabel }
  | { kind: 'sysinfo'; field: string; transform: SysinfoTransform };

export interface MetricDefinition {
  /** Metric identifier, also the default item key */
  name: string;
  source: MetricSource;
}

/**
 * Per-metric failure codes. A failing metric never stops the run; the
 * codes are collected and reported once at the end.
 */
export const MetricFailureCode = {
  MISSING_METRIC_NAME: 1,
  MISSING_DEVICE_HOST: 2,
  MISSING_INGEST_TARGET: 3,
  MISSING_INGEST_HOST_LABEL: 4,
  INGESTION_FAILED: 5,
  UNKNOWN_METRIC: 6,
  DEVICE_QUERY_FAILED: 7,
} as const;

export type MetricFailureCode =
  (typeof MetricFailureCode)[keyof typeof MetricFailureCode];

export interface MetricRequest {
  metricName: string;
  deviceHost: string;
  /** Zabbix server address */
  ingestTarget: string;
  /** Zabbix host object name */
  ingestHostLabel: string;
  /** Item key to send under instead of the metric name */
  displayAlias?: string;
  verbose: boolean;
}

export interface MetricFailure {
  metricName: string;
  code: MetricFailureCode;
  reason: string;
}

export type MetricOutcome =
  | { ok: true; metricName: string; itemKey: string; value: string }
  | ({ ok: false } & MetricFailure);
