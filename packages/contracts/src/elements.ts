import type { Alignment, HighlightColor, ListType } from './styles.js';

/**
 * Element collaborator contracts.
 *
 * The style engine never touches markup directly: it reads and writes formatting through
 * these accessors. Getters return `undefined` when the attribute is absent from the
 * element's own properties block. Setters only touch the attributes they are given.
 */

export interface StyleReferenceHolder {
  /** Name of the style attached through `w:pStyle`, `w:rStyle` or `w:tblStyle`. */
  getStyleName(): string | undefined;
  setStyleName(name: string): void;
  removeStyleName(): void;
}

export interface ListStyle {
  type: ListType;
  level: number;
}

export interface ParagraphSpacing {
  before?: number;
  after?: number;
}

export interface ParagraphIndentation {
  left?: number;
  right?: number;
}

export interface ParagraphElement extends StyleReferenceHolder {
  readonly kind: 'paragraph';
  getAlignment(): Alignment | undefined;
  setAlignment(alignment: Alignment): void;
  getSpacing(): ParagraphSpacing;
  setSpacing(before?: number, after?: number): void;
  getLineSpacing(): number | undefined;
  setLineSpacing(multiplier: number): void;
  getIndentation(): ParagraphIndentation;
  setIndentation(left?: number, right?: number): void;
  getFirstLineIndent(): number | undefined;
  setFirstLineIndent(points: number): void;
  getListStyle(): ListStyle | undefined;
  setListStyle(type: ListType, level: number): void;
  runs(): RunElement[];
}

export interface RunElement extends StyleReferenceHolder {
  readonly kind: 'run';
  getFontName(): string | undefined;
  setFontName(name: string): void;
  getFontSize(): number | undefined;
  setFontSize(points: number): void;
  getColor(): string | undefined;
  setColor(hex: string): void;
  getHighlight(): HighlightColor | undefined;
  setHighlight(color: HighlightColor): void;
  /** Bitmask of the formatting flags currently set on the run. */
  getFormatting(): number;
  getText(): string;
}

export interface CellMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface TableCellElement {
  paragraphs(): ParagraphElement[];
}

export interface TableRowElement {
  cells(): TableCellElement[];
}

export interface TableElement extends StyleReferenceHolder {
  readonly kind: 'table';
  getWidth(): number | undefined;
  setWidth(points: number): void;
  getAlignment(): string | undefined;
  setAlignment(alignment: string): void;
  getBorderStyle(): string | undefined;
  setBorderStyle(style: string): void;
  getBorderWidth(): number | undefined;
  setBorderWidth(points: number): void;
  getBorderColor(): string | undefined;
  setBorderColor(hex: string): void;
  getCellMargins(): CellMargins | undefined;
  setCellMargins(top: number, right: number, bottom: number, left: number): void;
  rows(): TableRowElement[];
}

/** Closed set of elements a style can be attached to. */
export type StyledElement = ParagraphElement | RunElement | TableElement;
export type StyledElementKind = StyledElement['kind'];

/** Document-level iteration used by bulk style application. */
export interface StyledDocument {
  /** Every paragraph, including paragraphs inside table cells, in document order. */
  paragraphs(): ParagraphElement[];
  /** Every run of every paragraph returned by {@link StyledDocument.paragraphs}. */
  runs(): RunElement[];
  tables(): TableElement[];
}
