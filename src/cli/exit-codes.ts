/**
 * Process exit codes of the forwarder.
 */
export const ExitCode = {
  SUCCESS: 0,
  /** Environment or model catalog failed validation */
  CONFIGURATION_INVALID: 1,
  ARGUMENTS_INVALID: 2,
  MISSING_DEVICE_HOST: 3,
  MISSING_ZABBIX_SERVER: 4,
  INIT_FAILED: 5,
  ITEMS_FAILED: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
