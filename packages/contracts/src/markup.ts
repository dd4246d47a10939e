/** WordprocessingML main namespace, bound to the `w:` prefix. */
export const WORDPROCESSINGML_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

// Native WordprocessingML units, per point.
export const TWIPS_PER_POINT = 20;
export const HALF_POINTS_PER_POINT = 2;
export const EIGHTHS_PER_POINT = 8;

/** `w:spacing/@w:line` units per single line when `w:lineRule="auto"`. */
export const LINE_SPACING_UNITS = 240;

/** Numbering instance ids referenced by list paragraphs and list styles. */
export const LIST_NUMBERING_IDS = { bullet: 1, number: 2 } as const;
