/**
 * One line of zabbix_sender input: `- <namespace>[<key>] <value>`.
 * The leading `-` tells the sender to use the host given with `-s`.
 */
export interface IngestionItem {
  key: string;
  value: string;
}

export interface IngestionTarget {
  /** Hostname or IP address of the Zabbix server or proxy */
  server: string;
  /** Name of the host object in Zabbix the item belongs to */
  hostLabel: string;
}

/**
 * Raised when zabbix_sender cannot be started or reports a failure.
 */
export class IngestionError extends Error {
  constructor(
    public readonly itemKey: string,
    message: string,
    public readonly exitCode?: number,
  ) {
    super(`[${itemKey}] ${message}`);
    this.name = 'IngestionError';
  }
}
