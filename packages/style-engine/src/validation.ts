import {
  ALIGNMENTS,
  HIGHLIGHT_COLORS,
  LIST_TYPES,
  fail,
  ok,
  type CharacterStyleProperties,
  type ParagraphStyleProperties,
  type StyleResult,
  type TableStyleProperties,
} from '@docstyle/contracts';

export const MAX_FONT_SIZE = 1000;
export const MAX_LIST_LEVEL = 8;
/** Every formatting flag set. */
export const ALL_FORMATTING_FLAGS = 0xff;

const HEX_COLOR = /^[0-9A-F]{6}$/;

const isOneOf = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((candidate) => candidate === value);

export function validateFontSize(size: number): StyleResult<number> {
  if (!Number.isFinite(size) || size <= 0 || size > MAX_FONT_SIZE) {
    return fail('INVALID_FONT_SIZE', `Font size must be greater than 0 and at most ${MAX_FONT_SIZE}pt`, {
      field: 'fontSize',
      value: size,
    });
  }
  return ok(size);
}

/** Accepts `RRGGBB` or `#RRGGBB` in any case; returns uppercase hex without `#`. */
export function normalizeHexColor(color: string, field = 'color'): StyleResult<string> {
  const hex = color.trim().replace(/^#/, '').toUpperCase();
  if (!HEX_COLOR.test(hex)) {
    return fail('INVALID_COLOR_FORMAT', `Color must be 6 hex digits, got '${color}'`, { field, value: color });
  }
  return ok(hex);
}

export function validateSpacing(value: number, field: string): StyleResult<number> {
  if (!Number.isFinite(value) || value < 0) {
    return fail('INVALID_SPACING', `${field} must be a non-negative number of points`, { field, value });
  }
  return ok(value);
}

function validateFinite(
  value: number,
  field: string,
  code: 'INVALID_MARGIN' | 'INVALID_SPACING',
): StyleResult<number> {
  if (!Number.isFinite(value)) {
    return fail(code, `${field} must be a finite number`, { field, value });
  }
  return ok(value);
}

/** Validates a paragraph bag and returns a normalized copy. */
export function validateParagraphProperties(props: ParagraphStyleProperties): StyleResult<ParagraphStyleProperties> {
  if (props.alignment !== undefined && !isOneOf(ALIGNMENTS, props.alignment)) {
    return fail('INVALID_ALIGNMENT', `Unknown paragraph alignment '${props.alignment}'`, {
      field: 'alignment',
      value: props.alignment,
    });
  }
  for (const field of ['spaceBefore', 'spaceAfter'] as const) {
    const value = props[field];
    if (value === undefined) continue;
    const checked = validateSpacing(value, field);
    if (!checked.success) return checked;
  }
  if (props.lineSpacing !== undefined && (!Number.isFinite(props.lineSpacing) || props.lineSpacing <= 0)) {
    return fail('INVALID_SPACING', 'lineSpacing must be a positive multiplier', {
      field: 'lineSpacing',
      value: props.lineSpacing,
    });
  }
  for (const field of ['leftIndent', 'rightIndent', 'firstLineIndent'] as const) {
    const value = props[field];
    if (value === undefined) continue;
    const checked = validateFinite(value, field, 'INVALID_MARGIN');
    if (!checked.success) return checked;
  }
  if (props.listType !== undefined && !isOneOf(LIST_TYPES, props.listType)) {
    return fail('VALIDATION_FAILED', `Unknown list type '${props.listType}'`, {
      field: 'listType',
      value: props.listType,
    });
  }
  if (
    props.listLevel !== undefined &&
    (!Number.isInteger(props.listLevel) || props.listLevel < 0 || props.listLevel > MAX_LIST_LEVEL)
  ) {
    return fail('VALIDATION_FAILED', `List level must be an integer between 0 and ${MAX_LIST_LEVEL}`, {
      field: 'listLevel',
      value: props.listLevel,
    });
  }
  return ok({ ...props });
}

/** Validates a character bag and returns a copy with the color normalized. */
export function validateCharacterProperties(props: CharacterStyleProperties): StyleResult<CharacterStyleProperties> {
  const result: CharacterStyleProperties = { ...props };

  if (props.fontName !== undefined && !props.fontName.trim()) {
    return fail('VALIDATION_FAILED', 'Font name cannot be empty', { field: 'fontName', value: props.fontName });
  }
  if (props.fontSize !== undefined) {
    const size = validateFontSize(props.fontSize);
    if (!size.success) return size;
  }
  if (props.fontColor !== undefined) {
    const color = normalizeHexColor(props.fontColor, 'fontColor');
    if (!color.success) return color;
    result.fontColor = color.value;
  }
  if (props.highlight !== undefined && !isOneOf(HIGHLIGHT_COLORS, props.highlight)) {
    return fail('VALIDATION_FAILED', `Unknown highlight color '${props.highlight}'`, {
      field: 'highlight',
      value: props.highlight,
    });
  }
  if (
    props.formatting !== undefined &&
    (!Number.isInteger(props.formatting) || props.formatting < 0 || props.formatting > ALL_FORMATTING_FLAGS)
  ) {
    return fail('VALIDATION_FAILED', 'Formatting must be a combination of formatting flags', {
      field: 'formatting',
      value: props.formatting,
    });
  }
  return ok(result);
}

/** Validates a table bag and returns a copy with the border color normalized. */
export function validateTableProperties(props: TableStyleProperties): StyleResult<TableStyleProperties> {
  const result: TableStyleProperties = { ...props };

  if (props.borderStyle !== undefined && !props.borderStyle.trim()) {
    return fail('INVALID_BORDER', 'Border style cannot be empty', { field: 'borderStyle', value: props.borderStyle });
  }
  if (props.borderWidth !== undefined && (!Number.isFinite(props.borderWidth) || props.borderWidth < 0)) {
    return fail('INVALID_BORDER', 'Border width must be a non-negative number of points', {
      field: 'borderWidth',
      value: props.borderWidth,
    });
  }
  if (props.borderColor !== undefined) {
    const color = normalizeHexColor(props.borderColor, 'borderColor');
    if (!color.success) return color;
    result.borderColor = color.value;
  }
  if (props.cellPadding !== undefined && (!Number.isFinite(props.cellPadding) || props.cellPadding < 0)) {
    return fail('INVALID_MARGIN', 'Cell padding must be a non-negative number of points', {
      field: 'cellPadding',
      value: props.cellPadding,
    });
  }
  if (props.width !== undefined && (!Number.isFinite(props.width) || props.width <= 0)) {
    return fail('INVALID_WIDTH', 'Table width must be a positive number of points', {
      field: 'width',
      value: props.width,
    });
  }
  if (props.alignment !== undefined && !props.alignment.trim()) {
    return fail('INVALID_ALIGNMENT', 'Table alignment cannot be empty', {
      field: 'alignment',
      value: props.alignment,
    });
  }
  return ok(result);
}
