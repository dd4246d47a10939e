import {
  EIGHTHS_PER_POINT,
  HALF_POINTS_PER_POINT,
  LINE_SPACING_UNITS,
  TWIPS_PER_POINT,
  fail,
  ok,
  type StyleResult,
} from '@docstyle/contracts';

/** Points per unit for the length suffixes accepted in style definitions. */
export const POINTS_PER_UNIT = {
  pt: 1,
  px: 0.75,
  in: 72,
  cm: 28.35,
  mm: 2.835,
} as const;

export type LengthUnit = keyof typeof POINTS_PER_UNIT;

/** Named colors accepted by {@link parseColor}. */
export const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: '000000',
  white: 'FFFFFF',
  red: 'FF0000',
  green: '008000',
  blue: '0000FF',
  yellow: 'FFFF00',
  cyan: '00FFFF',
  magenta: 'FF00FF',
};

const NUMERIC_CHARS = /[0-9.-]/;
const HEX_COLOR = /^[0-9a-fA-F]{6}$/;

function isLengthUnit(unit: string): unit is LengthUnit {
  return Object.prototype.hasOwnProperty.call(POINTS_PER_UNIT, unit);
}

/**
 * Parses a length literal into points.
 *
 * @example
 * ```typescript
 * parseValueWithUnit('16px'); // { success: true, value: 12 }
 * parseValueWithUnit('1in');  // { success: true, value: 72 }
 * ```
 */
export function parseValueWithUnit(text: string): StyleResult<number> {
  const source = text.trim();
  if (!source) {
    return fail('INVALID_ARGUMENT', 'Value string cannot be empty', { field: 'value', value: text });
  }

  let unitStart = source.length;
  for (let i = 0; i < source.length; i += 1) {
    if (!NUMERIC_CHARS.test(source[i])) {
      unitStart = i;
      break;
    }
  }
  if (unitStart === 0) {
    return fail('INVALID_ARGUMENT', `Invalid numeric value: '${text}'`, { field: 'value', value: text });
  }

  const numeric = Number(source.slice(0, unitStart));
  if (!Number.isFinite(numeric)) {
    return fail('INVALID_ARGUMENT', `Cannot parse numeric value: '${source.slice(0, unitStart)}'`, {
      field: 'value',
      value: text,
    });
  }

  const unit = source.slice(unitStart) || 'pt';
  if (!isLengthUnit(unit)) {
    return fail('INVALID_ARGUMENT', `Unsupported unit: '${unit}'`, { field: 'unit', value: unit });
  }
  return ok(numeric * POINTS_PER_UNIT[unit]);
}

/** `"50%"` → `0.5`. */
export function parsePercentage(text: string): StyleResult<number> {
  const source = text.trim();
  if (!source.endsWith('%')) {
    return fail('INVALID_ARGUMENT', `Invalid percentage format: '${text}'`, { field: 'percentage', value: text });
  }
  const numericPart = source.slice(0, -1).trim();
  const numeric = Number(numericPart);
  if (!numericPart || !Number.isFinite(numeric)) {
    return fail('INVALID_ARGUMENT', `Cannot parse percentage value: '${numericPart}'`, {
      field: 'percentage',
      value: text,
    });
  }
  return ok(numeric / 100);
}

/**
 * Parses a named color or a six-digit hex value (optionally `#`-prefixed) into uppercase
 * hex without the `#`.
 */
export function parseColor(text: string): StyleResult<string> {
  const source = text.trim();
  if (!source) {
    return fail('INVALID_ARGUMENT', 'Color string cannot be empty', { field: 'color', value: text });
  }

  const lower = source.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(NAMED_COLORS, lower)) return ok(NAMED_COLORS[lower]);

  const hex = source.startsWith('#') ? source.slice(1) : source;
  if (!HEX_COLOR.test(hex)) {
    return fail('INVALID_ARGUMENT', `Invalid hex color format: '${text}'`, { field: 'color', value: text });
  }
  return ok(hex.toUpperCase());
}

/** `formatValueWithUnit(12, 'pt')` → `"12.0pt"`. */
export function formatValueWithUnit(value: number, unit: string): string {
  return `${value.toFixed(1)}${unit}`;
}

export const pointsToTwips = (points: number): number => Math.round(points * TWIPS_PER_POINT);
export const twipsToPoints = (twips: number): number => twips / TWIPS_PER_POINT;
export const pointsToHalfPoints = (points: number): number => Math.round(points * HALF_POINTS_PER_POINT);
export const pointsToEighths = (points: number): number => Math.round(points * EIGHTHS_PER_POINT);
export const lineSpacingToUnits = (multiplier: number): number => Math.round(multiplier * LINE_SPACING_UNITS);
