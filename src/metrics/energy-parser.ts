import { EnergyLabel } from './interfaces/metric-definition.interface';

const UNIT_SUFFIX = /\s(A|V|W|kWh)/;

/**
 * Two decimals, rounding exact halves to even like `printf "%.2f"`.
 *
 * A binary double sits exactly halfway between two hundredths only when it
 * is an odd multiple of 1/8 (0.125, 0.375, ...); every other value is
 * rounded by toFixed from its exact binary value already.
 */
export function formatTwoDecimals(value: number): string {
  const isExactHalf =
    Number.isInteger(value * 8) && !Number.isInteger(value * 4);
  if (!isExactHalf) {
    return value.toFixed(2);
  }
  const scaled = value * 100;
  const lower = Math.floor(scaled);
  const even = lower % 2 === 0 ? lower : lower + 1;
  return (even / 100).toFixed(2);
}

/**
 * Extract one reading from `kasa emeter` output.
 *
 * Takes the first line starting with the label, removes the label and the
 * unit, and renders the number with two decimals:
 *   "Voltage: 230.456 V" -> "230.46"
 *
 * Returns an empty string when the line is missing or not numeric; the
 * caller forwards it as is.
 */
export function extractEnergyValue(output: string, label: EnergyLabel): string {
  const line = output
    .split(/\r?\n/)
    .find((candidate) => candidate.startsWith(label));
  if (line === undefined) {
    return '';
  }

  const text = line.slice(label.length).replace(UNIT_SUFFIX, '').trim();
  if (text === '') {
    return '';
  }

  const value = Number(text);
  return Number.isFinite(value) ? formatTwoDecimals(value) : '';
}
