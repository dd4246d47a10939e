// ---------------------------------------------------------------------------
// Style kinds
// ---------------------------------------------------------------------------

/** Kinds of styles held by a style registry. */
export const STYLE_TYPES = ['paragraph', 'character', 'table', 'numbering', 'mixed'] as const;
export type StyleType = (typeof STYLE_TYPES)[number];

/** Built-in style library categories. */
export const BUILT_IN_STYLE_CATEGORIES = ['heading', 'body-text', 'list', 'table', 'technical'] as const;
export type BuiltInStyleCategory = (typeof BUILT_IN_STYLE_CATEGORIES)[number];

// ---------------------------------------------------------------------------
// Enumerated property values
// ---------------------------------------------------------------------------

/** Paragraph alignment. `justify` is written as `both` in WordprocessingML. */
export const ALIGNMENTS = ['left', 'center', 'right', 'justify'] as const;
export type Alignment = (typeof ALIGNMENTS)[number];

export const LIST_TYPES = ['none', 'bullet', 'number'] as const;
export type ListType = (typeof LIST_TYPES)[number];

/** Highlight colors, spelled as the `w:highlight/@w:val` values. */
export const HIGHLIGHT_COLORS = [
  'none',
  'black',
  'blue',
  'cyan',
  'green',
  'magenta',
  'red',
  'yellow',
  'white',
  'darkBlue',
  'darkCyan',
  'darkGreen',
  'darkMagenta',
  'darkRed',
  'darkYellow',
  'lightGray',
] as const;
export type HighlightColor = (typeof HIGHLIGHT_COLORS)[number];

/**
 * Run formatting flags. Values are bits and compose freely:
 * `FormattingFlags.bold | FormattingFlags.italic`.
 */
export const FormattingFlags = {
  none: 0,
  bold: 1 << 0,
  italic: 1 << 1,
  underline: 1 << 2,
  strikethrough: 1 << 3,
  superscript: 1 << 4,
  subscript: 1 << 5,
  smallCaps: 1 << 6,
  shadow: 1 << 7,
} as const;
export type FormattingFlagName = Exclude<keyof typeof FormattingFlags, 'none'>;

export function hasFormattingFlag(mask: number | undefined, flag: FormattingFlagName): boolean {
  return mask != null && (mask & FormattingFlags[flag]) !== 0;
}

// ---------------------------------------------------------------------------
// Property bags
// ---------------------------------------------------------------------------

/**
 * Paragraph-level formatting. Lengths are in points.
 * A missing key means "not specified", which is different from a default value.
 */
export interface ParagraphStyleProperties {
  alignment?: Alignment;
  spaceBefore?: number;
  spaceAfter?: number;
  /** Line spacing multiplier (1 = single, 1.5, 2 = double). */
  lineSpacing?: number;
  leftIndent?: number;
  rightIndent?: number;
  /** Negative values describe a hanging indent. */
  firstLineIndent?: number;
  listType?: ListType;
  listLevel?: number;
}

/** Run-level formatting. */
export interface CharacterStyleProperties {
  fontName?: string;
  /** Points, in the range (0, 1000]. */
  fontSize?: number;
  /** Six uppercase hex digits, no leading `#`. */
  fontColor?: string;
  highlight?: HighlightColor;
  /** Bitmask of {@link FormattingFlags}. */
  formatting?: number;
}

/** Table-level formatting. Lengths are in points. */
export interface TableStyleProperties {
  borderStyle?: string;
  borderWidth?: number;
  borderColor?: string;
  cellPadding?: number;
  width?: number;
  alignment?: string;
}

export type PropertyKind = 'paragraph' | 'character' | 'table';

export interface PropertyBags {
  paragraph: ParagraphStyleProperties;
  character: CharacterStyleProperties;
  table: TableStyleProperties;
}
