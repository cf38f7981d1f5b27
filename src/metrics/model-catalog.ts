import { z } from 'zod';

/**
 * Per-model knowledge the forwarder needs:
 *
 * - lineBudgets: how many trailing lines of `kasa sysinfo` output form the
 *   pseudo-JSON payload (everything before is banner text)
 * - extensions: extra system info fields only that model reports, written
 *   as `field[:alias]` tokens separated by commas
 *
 * Keys are sanitized hardware model identifiers (see hardware-model.ts).
 */
export const modelCatalogSchema = z.object({
  lineBudgets: z.record(z.string().min(1), z.number().int().positive()),
  extensions: z.record(z.string().min(1), z.string()).default({}),
});

export type ModelCatalog = z.infer<typeof modelCatalogSchema>;

export const DEFAULT_MODEL_CATALOG: ModelCatalog = {
  lineBudgets: {
    HS110_EU_: 23,
    KP115_EU_: 25,
  },
  extensions: {
    KP115_EU_: 'mic_type:type,ntc_state,obd_src,status',
  },
};

const TOKEN = '[A-Za-z0-9_]+(?::[A-Za-z0-9_]+)?';

/** One or more `name[:alias]` tokens, comma separated, nothing else */
export const EXTENSION_ENTRY_PATTERN = new RegExp(
  `^${TOKEN}(?:,${TOKEN})*$`,
);

export interface ExtensionItem {
  field: string;
  alias?: string;
}

export function isWellFormedExtension(entry: string): boolean {
  return EXTENSION_ENTRY_PATTERN.test(entry);
}

/**
 * Split an extension entry into its fields.
 * `mic_type:type,ntc_state` -> [{ field: 'mic_type', alias: 'type' }, { field: 'ntc_state' }]
 */
export function parseExtensionEntry(entry: string): ExtensionItem[] {
  return entry
    .split(',')
    .filter((token) => token !== '')
    .map((token) => {
      const [field, alias] = token.split(':');
      return alias ? { field, alias } : { field };
    });
}
