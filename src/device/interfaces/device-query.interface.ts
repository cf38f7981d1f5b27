/**
 * The two read operations a smart plug exposes through its control CLI.
 *
 * Both return free-form text. The energy reading is a list of
 * `Label: value unit` lines; the system info ends with a single-quoted
 * pseudo-JSON dump whose length depends on the hardware model.
 */
export type DeviceQueryKind = 'emeter' | 'sysinfo';

export interface IDeviceQuery {
  queryEnergy(host: string): Promise<string>;
  querySystemInfo(host: string): Promise<string>;
}

/**
 * Raised when the device CLI cannot be started or exits non-zero.
 */
export class DeviceQueryError extends Error {
  constructor(
    public readonly query: DeviceQueryKind,
    public readonly host: string,
    message: string,
    public readonly exitCode?: number,
  ) {
    super(`[${query}@${host}] ${message}`);
    this.name = 'DeviceQueryError';
  }
}
