import { describe, expect, it } from 'vitest';
import {
  formatValueWithUnit,
  lineSpacingToUnits,
  parseColor,
  parsePercentage,
  parseValueWithUnit,
  pointsToEighths,
  pointsToHalfPoints,
  pointsToTwips,
  twipsToPoints,
} from './units.js';

describe('units - parseValueWithUnit', () => {
  it('treats a bare number as points', () => {
    expect(parseValueWithUnit('12')).toEqual({ success: true, value: 12 });
  });

  it('converts supported units to points', () => {
    expect(parseValueWithUnit('16px')).toEqual({ success: true, value: 12 });
    expect(parseValueWithUnit('1in')).toEqual({ success: true, value: 72 });
    expect(parseValueWithUnit(' 2pt ')).toEqual({ success: true, value: 2 });
    expect(parseValueWithUnit('-4pt')).toEqual({ success: true, value: -4 });
  });

  it('rejects unknown units', () => {
    const result = parseValueWithUnit('3em');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('INVALID_ARGUMENT');
    expect(result.error.message).toBe("Unsupported unit: 'em'");
  });

  it('rejects empty and non-numeric input', () => {
    expect(parseValueWithUnit('   ').success).toBe(false);
    expect(parseValueWithUnit('pt').success).toBe(false);
    expect(parseValueWithUnit('1.2.3pt').success).toBe(false);
  });
});

describe('units - parsePercentage', () => {
  it('returns a fraction', () => {
    expect(parsePercentage('50%')).toEqual({ success: true, value: 0.5 });
    expect(parsePercentage('150 %')).toEqual({ success: true, value: 1.5 });
  });

  it('requires a percent sign and a number', () => {
    expect(parsePercentage('50').success).toBe(false);
    expect(parsePercentage('%').success).toBe(false);
    expect(parsePercentage('abc%').success).toBe(false);
  });
});

describe('units - parseColor', () => {
  it('resolves named colors case-insensitively', () => {
    expect(parseColor('Red')).toEqual({ success: true, value: 'FF0000' });
    expect(parseColor('green')).toEqual({ success: true, value: '008000' });
  });

  it('uppercases hex with or without a leading #', () => {
    expect(parseColor('#00ff7f')).toEqual({ success: true, value: '00FF7F' });
    expect(parseColor('1f4e79')).toEqual({ success: true, value: '1F4E79' });
  });

  it('does not treat object keys as color names', () => {
    expect(parseColor('constructor').success).toBe(false);
  });

  it('rejects malformed hex', () => {
    const result = parseColor('#12345');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('INVALID_ARGUMENT');
  });
});

describe('units - conversions', () => {
  it('formats with one decimal', () => {
    expect(formatValueWithUnit(12, 'pt')).toBe('12.0pt');
    expect(formatValueWithUnit(0.25, 'in')).toBe('0.3in');
  });

  it('converts points to markup units', () => {
    expect(pointsToTwips(12)).toBe(240);
    expect(twipsToPoints(360)).toBe(18);
    expect(pointsToHalfPoints(10.5)).toBe(21);
    expect(pointsToEighths(0.5)).toBe(4);
    expect(lineSpacingToUnits(1.5)).toBe(360);
  });
});
