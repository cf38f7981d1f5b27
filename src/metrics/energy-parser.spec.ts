import { extractEnergyValue, formatTwoDecimals } from './energy-parser';
import { KASA_EMETER } from '../../test/utils/mock-data';

describe('extractEnergyValue', () => {
  it('should strip label and unit and round to two decimals', () => {
    expect(extractEnergyValue('Voltage: 230.456 V', 'Voltage:')).toBe('230.46');
  });

  it('should read every reading from emeter output', () => {
    expect(extractEnergyValue(KASA_EMETER, 'Current:')).toBe('0.12');
    expect(extractEnergyValue(KASA_EMETER, 'Voltage:')).toBe('230.46');
    expect(extractEnergyValue(KASA_EMETER, 'Power:')).toBe('15.68');
    expect(extractEnergyValue(KASA_EMETER, 'Total consumption:')).toBe('12.35');
  });

  it('should pad whole numbers', () => {
    expect(extractEnergyValue('Power: 0 W', 'Power:')).toBe('0.00');
  });

  it('should only match lines starting with the label', () => {
    const output = "Today's Power: 99 W\nPower: 1.5 W";
    expect(extractEnergyValue(output, 'Power:')).toBe('1.50');
  });

  it('should return empty string when the label is absent', () => {
    expect(extractEnergyValue('== Emeter ==\n', 'Voltage:')).toBe('');
  });

  it('should return empty string for a non-numeric value', () => {
    expect(extractEnergyValue('Voltage: n/a V', 'Voltage:')).toBe('');
  });

  it('should return empty string for a label without value', () => {
    expect(extractEnergyValue('Voltage:', 'Voltage:')).toBe('');
  });
});

describe('formatTwoDecimals', () => {
  it('should round exact halves to even', () => {
    expect(formatTwoDecimals(0.125)).toBe('0.12');
    expect(formatTwoDecimals(0.375)).toBe('0.38');
    expect(formatTwoDecimals(2.625)).toBe('2.62');
    expect(formatTwoDecimals(-0.125)).toBe('-0.12');
  });

  it('should round other values from their binary value', () => {
    expect(formatTwoDecimals(0.123)).toBe('0.12');
    expect(formatTwoDecimals(12.345)).toBe('12.35');
    expect(formatTwoDecimals(0.25)).toBe('0.25');
  });

  it('should apply to emeter readings', () => {
    expect(extractEnergyValue('Current: 0.125 A', 'Current:')).toBe('0.12');
  });
});
