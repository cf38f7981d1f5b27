/**
 * Hardware model detection from `kasa sysinfo` output.
 *
 * The dump contains a line like `  'model': 'HS110(EU)',`; the model is
 * turned into an identifier usable as a catalog key:
 *   'HS110(EU)', -> HS110_EU_
 *   'KP115(EU)', -> KP115_EU_
 */

const MODEL_LINE = /^\s+'model':\s*(\S+)/;

/**
 * Drop the first comma, delete quotes, and replace anything that is not
 * alphanumeric with an underscore.
 */
export function sanitizeHardwareModel(raw: string): string {
  return raw
    .replace(',', '')
    .replaceAll("'", '')
    .replace(/[^A-Za-z0-9]/g, '_');
}

/**
 * Sanitized model identifier, or an empty string when no model line exists.
 */
export function extractHardwareModel(systemInfo: string): string {
  for (const line of systemInfo.split(/\r?\n/)) {
    const match = MODEL_LINE.exec(line);
    if (match) {
      return sanitizeHardwareModel(match[1]);
    }
  }
  return '';
}
