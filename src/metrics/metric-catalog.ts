import {
  EnergyLabel,
  MetricDefinition,
  SysinfoTransform,
} from './interfaces/metric-definition.interface';

const energy = (name: string, label: EnergyLabel): MetricDefinition => ({
  name,
  source: { kind: 'energy', label },
});

const sysinfo = (
  name: string,
  transform: SysinfoTransform = 'none',
): MetricDefinition => ({
  name,
  source: { kind: 'sysinfo', field: name, transform },
});

/**
 * Metrics every supported plug delivers, in the order they are sent.
 */
export const METRIC_CATALOG: readonly MetricDefinition[] = [
  sysinfo('active_mode'),
  sysinfo('alias'),
  energy('current_ma', 'Current:'),
  sysinfo('dev_name'),
  sysinfo('deviceId'),
  sysinfo('err_code'),
  sysinfo('feature'),
  sysinfo('fwId'),
  sysinfo('hwId'),
  sysinfo('hw_ver'),
  sysinfo('icon_hash', 'emptyAsToken'),
  sysinfo('latitude_i'),
  sysinfo('led_off', 'invertFlag'),
  sysinfo('longitude_i'),
  sysinfo('mac'),
  sysinfo('model'),
  sysinfo('next_action', 'nestedType'),
  sysinfo('oemId'),
  sysinfo('on_time', 'secondsAgoTimestamp'),
  energy('power_mw', 'Power:'),
  sysinfo('relay_state'),
  sysinfo('rssi'),
  sysinfo('sw_ver'),
  energy('total_wh', 'Total consumption:'),
  sysinfo('type'),
  sysinfo('updating'),
  energy('voltage_mv', 'Voltage:'),
];

/**
 * Build the set of metrics known to a run: the common catalog plus the
 * model-specific system info fields. A model field that is also in the
 * catalog keeps the catalog definition (and its transform).
 */
export function buildMetricRegistry(
  extensionFields: readonly string[] = [],
): Map<string, MetricDefinition> {
  const registry = new Map<string, MetricDefinition>(
    METRIC_CATALOG.map((definition) => [definition.name, definition]),
  );
  for (const field of extensionFields) {
    if (!registry.has(field)) {
      registry.set(field, sysinfo(field));
    }
  }
  return registry;
}
