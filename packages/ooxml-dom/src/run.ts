import {
  FormattingFlags,
  HIGHLIGHT_COLORS,
  type HighlightColor,
  type RunElement,
} from '@docstyle/contracts';
import { HALF_POINTS_PER_POINT, RUN_PROPERTY_ORDER } from './constants.js';
import {
  childElements,
  ensureChild,
  ensurePropertiesBlock,
  findChild,
  isToggleOn,
  readAttr,
  readChildVal,
  readNumberAttr,
  removeChild,
  writeAttr,
} from './markup.js';

function isHighlightColor(value: string | undefined): value is HighlightColor {
  return HIGHLIGHT_COLORS.some((color) => color === value);
}

/** `w:r` element adapter. */
export class DocxRun implements RunElement {
  readonly kind = 'run' as const;

  constructor(readonly node: Element) {}

  private get properties(): Element | undefined {
    return findChild(this.node, 'w:rPr');
  }

  private property(name: string): Element {
    return ensureChild(ensurePropertiesBlock(this.node, 'w:rPr'), name, RUN_PROPERTY_ORDER);
  }

  getStyleName(): string | undefined {
    return readChildVal(this.properties, 'w:rStyle');
  }

  setStyleName(name: string): void {
    writeAttr(this.property('w:rStyle'), 'w:val', name);
  }

  removeStyleName(): void {
    removeChild(this.properties, 'w:rStyle');
  }

  getFontName(): string | undefined {
    const fonts = findChild(this.properties, 'w:rFonts');
    return readAttr(fonts, 'w:ascii') ?? readAttr(fonts, 'w:hAnsi');
  }

  setFontName(name: string): void {
    const fonts = this.property('w:rFonts');
    for (const slot of ['w:ascii', 'w:hAnsi', 'w:eastAsia', 'w:cs']) {
      writeAttr(fonts, slot, name);
    }
  }

  getFontSize(): number | undefined {
    const halfPoints = readNumberAttr(findChild(this.properties, 'w:sz'), 'w:val');
    return halfPoints === undefined ? undefined : halfPoints / HALF_POINTS_PER_POINT;
  }

  setFontSize(points: number): void {
    const halfPoints = Math.round(points * HALF_POINTS_PER_POINT);
    writeAttr(this.property('w:sz'), 'w:val', halfPoints);
    writeAttr(this.property('w:szCs'), 'w:val', halfPoints);
  }

  getColor(): string | undefined {
    const value = readChildVal(this.properties, 'w:color');
    if (value === undefined || value === 'auto') return undefined;
    return value.toUpperCase();
  }

  setColor(hex: string): void {
    writeAttr(this.property('w:color'), 'w:val', hex.replace(/^#/, '').toUpperCase());
  }

  getHighlight(): HighlightColor | undefined {
    const value = readChildVal(this.properties, 'w:highlight');
    return isHighlightColor(value) ? value : undefined;
  }

  setHighlight(color: HighlightColor): void {
    if (color === 'none') {
      removeChild(this.properties, 'w:highlight');
      return;
    }
    writeAttr(this.property('w:highlight'), 'w:val', color);
  }

  getFormatting(): number {
    const rPr = this.properties;
    if (!rPr) return FormattingFlags.none;

    let mask: number = FormattingFlags.none;
    if (isToggleOn(rPr, 'w:b')) mask |= FormattingFlags.bold;
    if (isToggleOn(rPr, 'w:i')) mask |= FormattingFlags.italic;
    const underline = readChildVal(rPr, 'w:u');
    if (findChild(rPr, 'w:u') && underline !== 'none') mask |= FormattingFlags.underline;
    if (isToggleOn(rPr, 'w:strike')) mask |= FormattingFlags.strikethrough;
    const vertAlign = readChildVal(rPr, 'w:vertAlign');
    if (vertAlign === 'superscript') mask |= FormattingFlags.superscript;
    if (vertAlign === 'subscript') mask |= FormattingFlags.subscript;
    if (isToggleOn(rPr, 'w:smallCaps')) mask |= FormattingFlags.smallCaps;
    if (isToggleOn(rPr, 'w:shadow')) mask |= FormattingFlags.shadow;
    return mask;
  }

  getText(): string {
    return childElements(this.node)
      .map((child) => {
        if (child.nodeName === 'w:t') return child.textContent ?? '';
        if (child.nodeName === 'w:tab') return '\t';
        if (child.nodeName === 'w:br') return '\n';
        return '';
      })
      .join('');
  }
}
