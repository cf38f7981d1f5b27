import { IDeviceQuery } from '../device/interfaces/device-query.interface';

/**
 * QueryContext - state of a single run against one device
 *
 * Holds the two device readings so each is fetched at most once, no matter
 * how many metrics are read from it. The pending promise itself is cached,
 * so a failed query is not repeated either: every later metric sees the
 * same rejection.
 *
 * A new context is created for every run; nothing is shared across runs.
 */
export class QueryContext {
  private energyReading?: Promise<string>;
  private systemInfoReading?: Promise<string>;

  /** Sanitized model identifier, set by the preflight gate */
  hardwareModel = '';
  /** Trailing sysinfo lines holding the payload, set by the preflight gate */
  lineBudget = 0;

  constructor(
    readonly deviceHost: string,
    private readonly device: IDeviceQuery,
  ) {}

  energy(): Promise<string> {
    if (!this.energyReading) {
      this.energyReading = this.device.queryEnergy(this.deviceHost);
    }
    return this.energyReading;
  }

  systemInfo(): Promise<string> {
    if (!this.systemInfoReading) {
      this.systemInfoReading = this.device.querySystemInfo(this.deviceHost);
    }
    return this.systemInfoReading;
  }
}
