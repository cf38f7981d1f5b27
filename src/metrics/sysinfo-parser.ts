import { format, isValid, subSeconds } from 'date-fns';
import { z } from 'zod';
import { SysinfoTransform } from './interfaces/metric-definition.interface';

/** Format of converted `on_time` values */
export const ON_TIME_FORMAT = 'dd.MM.yyyy HH:mm:ss';

const payloadSchema = z.record(z.string(), z.unknown());

export type SystemInfoPayload = z.infer<typeof payloadSchema>;

/**
 * Keep the trailing `lineBudget` lines of the output; the lines before
 * them are banner text and not part of the payload.
 */
export function selectPayloadLines(output: string, lineBudget: number): string {
  const lines = output.trimEnd().split(/\r?\n/);
  return lines.slice(Math.max(lines.length - lineBudget, 0)).join('\n');
}

/**
 * The device CLI prints a Python-style dict; swapping single quotes for
 * double quotes turns it into JSON.
 */
export function normalizePseudoJson(text: string): string {
  return text.replaceAll("'", '"');
}

/**
 * Parse the system info payload, or null when it is not a JSON object.
 */
export function parseSystemInfo(
  output: string,
  lineBudget: number,
): SystemInfoPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(
      normalizePseudoJson(selectPayloadLines(output, lineBudget)),
    );
  } catch {
    return null;
  }
  const result = payloadSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Render a field the way `jq -r` prints it: strings raw, null or absent
 * as `null`, objects and arrays as compact JSON.
 */
export function renderValue(value: unknown): string {
  if (value === undefined || value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Timestamp `seconds` before `now`, or an empty string if `seconds` is
 * not a number or lands outside the range of a Date.
 */
export function formatSecondsAgo(seconds: string, now: Date): string {
  if (seconds.trim() === '') {
    return '';
  }
  const amount = Number(seconds);
  if (!Number.isFinite(amount)) {
    return '';
  }
  const switchedOn = subSeconds(now, amount);
  if (!isValid(switchedOn)) {
    return '';
  }
  return format(switchedOn, ON_TIME_FORMAT);
}

/**
 * Apply a field transform and render the result.
 */
export function applyTransform(
  transform: SysinfoTransform,
  value: unknown,
  now: Date,
): string {
  switch (transform) {
    case 'none':
      return renderValue(value);
    case 'emptyAsToken': {
      // an empty value ends up as "not supported" in Zabbix
      const rendered = renderValue(value);
      return rendered === '' ? 'empty' : rendered;
    }
    case 'invertFlag': {
      const rendered = renderValue(value);
      if (rendered === '1') return '0';
      if (rendered === '0') return '1';
      return rendered;
    }
    case 'nestedType': {
      if (value === undefined || value === null) {
        return 'null';
      }
      const nested = payloadSchema.safeParse(value);
      return nested.success ? renderValue(nested.data.type) : '';
    }
    case 'secondsAgoTimestamp':
      return formatSecondsAgo(renderValue(value), now);
    default: {
      const unhandled: never = transform;
      throw new Error(`Unhandled transform: ${String(unhandled)}`);
    }
  }
}
