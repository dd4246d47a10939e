import type { CellMargins, TableCellElement, TableElement, TableRowElement } from '@docstyle/contracts';
import {
  CELL_MARGIN_SIDES,
  EIGHTHS_PER_POINT,
  TABLE_BORDER_SIDES,
  TABLE_PROPERTY_ORDER,
  TWIPS_PER_POINT,
} from './constants.js';
import {
  childElements,
  ensureChild,
  ensurePropertiesBlock,
  findChild,
  readAttr,
  readChildVal,
  readNumberAttr,
  removeChild,
  writeAttr,
} from './markup.js';
import { DocxParagraph } from './paragraph.js';

const toTwips = (points: number) => Math.round(points * TWIPS_PER_POINT);
const DEFAULT_BORDER_STYLE = 'single';

export class DocxTableCell implements TableCellElement {
  constructor(readonly node: Element) {}

  paragraphs(): DocxParagraph[] {
    return childElements(this.node, 'w:p').map((p) => new DocxParagraph(p));
  }
}

export class DocxTableRow implements TableRowElement {
  constructor(readonly node: Element) {}

  cells(): DocxTableCell[] {
    return childElements(this.node, 'w:tc').map((tc) => new DocxTableCell(tc));
  }
}

/**
 * `w:tbl` element adapter.
 *
 * Borders are written to all four outer edges and both inside edges; reads come from the
 * top edge.
 */
export class DocxTable implements TableElement {
  readonly kind = 'table' as const;

  constructor(readonly node: Element) {}

  private get properties(): Element | undefined {
    return findChild(this.node, 'w:tblPr');
  }

  private property(name: string): Element {
    return ensureChild(ensurePropertiesBlock(this.node, 'w:tblPr'), name, TABLE_PROPERTY_ORDER);
  }

  /** Every border edge, created as a single line when missing, since `w:val` is required. */
  private borderEdges(): Element[] {
    const borders = this.property('w:tblBorders');
    return TABLE_BORDER_SIDES.map((side) => {
      const edge = ensureChild(borders, side, TABLE_BORDER_SIDES);
      if (readAttr(edge, 'w:val') === undefined) writeAttr(edge, 'w:val', DEFAULT_BORDER_STYLE);
      return edge;
    });
  }

  private get topBorder(): Element | undefined {
    return findChild(findChild(this.properties, 'w:tblBorders'), 'w:top');
  }

  getStyleName(): string | undefined {
    return readChildVal(this.properties, 'w:tblStyle');
  }

  setStyleName(name: string): void {
    writeAttr(this.property('w:tblStyle'), 'w:val', name);
  }

  removeStyleName(): void {
    removeChild(this.properties, 'w:tblStyle');
  }

  /** Width in points; only absolute (`dxa`) widths are reported. */
  getWidth(): number | undefined {
    const tblW = findChild(this.properties, 'w:tblW');
    const type = readAttr(tblW, 'w:type');
    if (type !== undefined && type !== 'dxa') return undefined;
    const twips = readNumberAttr(tblW, 'w:w');
    return twips === undefined ? undefined : twips / TWIPS_PER_POINT;
  }

  setWidth(points: number): void {
    const tblW = this.property('w:tblW');
    writeAttr(tblW, 'w:w', toTwips(points));
    writeAttr(tblW, 'w:type', 'dxa');
  }

  getAlignment(): string | undefined {
    return readChildVal(this.properties, 'w:jc');
  }

  setAlignment(alignment: string): void {
    writeAttr(this.property('w:jc'), 'w:val', alignment);
  }

  getBorderStyle(): string | undefined {
    return readAttr(this.topBorder, 'w:val');
  }

  setBorderStyle(style: string): void {
    for (const edge of this.borderEdges()) writeAttr(edge, 'w:val', style);
  }

  getBorderWidth(): number | undefined {
    const eighths = readNumberAttr(this.topBorder, 'w:sz');
    return eighths === undefined ? undefined : eighths / EIGHTHS_PER_POINT;
  }

  setBorderWidth(points: number): void {
    for (const edge of this.borderEdges()) {
      writeAttr(edge, 'w:sz', Math.round(points * EIGHTHS_PER_POINT));
    }
  }

  getBorderColor(): string | undefined {
    const color = readAttr(this.topBorder, 'w:color');
    if (color === undefined || color === 'auto') return undefined;
    return color.toUpperCase();
  }

  setBorderColor(hex: string): void {
    const color = hex.replace(/^#/, '').toUpperCase();
    for (const edge of this.borderEdges()) writeAttr(edge, 'w:color', color);
  }

  getCellMargins(): CellMargins | undefined {
    const margins = findChild(this.properties, 'w:tblCellMar');
    if (!margins) return undefined;
    const side = (name: string) => (readNumberAttr(findChild(margins, name), 'w:w') ?? 0) / TWIPS_PER_POINT;
    return { top: side('w:top'), right: side('w:right'), bottom: side('w:bottom'), left: side('w:left') };
  }

  setCellMargins(top: number, right: number, bottom: number, left: number): void {
    const margins = this.property('w:tblCellMar');
    const values: Record<(typeof CELL_MARGIN_SIDES)[number], number> = {
      'w:top': top,
      'w:left': left,
      'w:bottom': bottom,
      'w:right': right,
    };
    for (const side of CELL_MARGIN_SIDES) {
      const edge = ensureChild(margins, side, CELL_MARGIN_SIDES);
      writeAttr(edge, 'w:w', toTwips(values[side]));
      writeAttr(edge, 'w:type', 'dxa');
    }
  }

  rows(): DocxTableRow[] {
    return childElements(this.node, 'w:tr').map((tr) => new DocxTableRow(tr));
  }
}
