import type {
  CharacterStyleProperties,
  ParagraphStyleProperties,
  PropertyBags,
  PropertyKind,
  TableStyleProperties,
} from '@docstyle/contracts';

/**
 * Fields of each property bag, in serialization order. Cascade helpers only copy the
 * fields listed here.
 */
export const PARAGRAPH_FIELDS = [
  'alignment',
  'spaceBefore',
  'spaceAfter',
  'lineSpacing',
  'leftIndent',
  'rightIndent',
  'firstLineIndent',
  'listType',
  'listLevel',
] as const satisfies readonly (keyof ParagraphStyleProperties)[];

export const CHARACTER_FIELDS = [
  'fontName',
  'fontSize',
  'fontColor',
  'highlight',
  'formatting',
] as const satisfies readonly (keyof CharacterStyleProperties)[];

export const TABLE_FIELDS = [
  'borderStyle',
  'borderWidth',
  'borderColor',
  'cellPadding',
  'width',
  'alignment',
] as const satisfies readonly (keyof TableStyleProperties)[];

export const PROPERTY_FIELDS: { [K in PropertyKind]: readonly (keyof PropertyBags[K])[] } = {
  paragraph: PARAGRAPH_FIELDS,
  character: CHARACTER_FIELDS,
  table: TABLE_FIELDS,
};

/**
 * Combines property layers; later layers win.
 *
 * Only defined values are copied, so a field left unset by a layer never clears what an
 * earlier layer set. Inputs are not mutated. Null and undefined layers are skipped.
 *
 * @example
 * ```typescript
 * combineProperties([{ spaceBefore: 10 }, { spaceBefore: 20, alignment: 'center' }], PARAGRAPH_FIELDS);
 * // { spaceBefore: 20, alignment: 'center' }
 * ```
 */
export function combineProperties<T extends object>(
  layers: ReadonlyArray<T | null | undefined>,
  fields: readonly (keyof T)[],
): Partial<T> {
  const result: Partial<T> = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const field of fields) {
      const value = layer[field];
      if (value !== undefined) result[field] = value;
    }
  }
  return result;
}

/** Copies every set field of `override` onto a copy of `base`. */
export function overlay<T extends object>(base: T, override: T | undefined, fields: readonly (keyof T)[]): T {
  const result: T = { ...base };
  if (!override) return result;
  for (const field of fields) {
    const value = override[field];
    if (value !== undefined) result[field] = value;
  }
  return result;
}

/** Returns true when no field of `bag` is set. */
export function isEmptyBag<T extends object>(bag: T, fields: readonly (keyof T)[]): boolean {
  return fields.every((field) => bag[field] === undefined);
}
