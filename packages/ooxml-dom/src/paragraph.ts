import {
  LIST_NUMBERING_IDS,
  type Alignment,
  type ListStyle,
  type ListType,
  type ParagraphElement,
  type ParagraphIndentation,
  type ParagraphSpacing,
} from '@docstyle/contracts';
import { LINE_SPACING_UNITS, PARAGRAPH_PROPERTY_ORDER, TWIPS_PER_POINT } from './constants.js';
import {
  childElements,
  ensureChild,
  ensurePropertiesBlock,
  findChild,
  readAttr,
  readChildVal,
  readNumberAttr,
  removeAttr,
  removeChild,
  writeAttr,
} from './markup.js';
import { DocxRun } from './run.js';

const ALIGNMENT_FROM_JC: Record<string, Alignment> = {
  left: 'left',
  start: 'left',
  center: 'center',
  right: 'right',
  end: 'right',
  both: 'justify',
  distribute: 'justify',
};

const toTwips = (points: number) => Math.round(points * TWIPS_PER_POINT);
const fromTwips = (twips: number | undefined) => (twips === undefined ? undefined : twips / TWIPS_PER_POINT);

/** `w:p` element adapter. */
export class DocxParagraph implements ParagraphElement {
  readonly kind = 'paragraph' as const;

  constructor(readonly node: Element) {}

  private get properties(): Element | undefined {
    return findChild(this.node, 'w:pPr');
  }

  private property(name: string): Element {
    return ensureChild(ensurePropertiesBlock(this.node, 'w:pPr'), name, PARAGRAPH_PROPERTY_ORDER);
  }

  getStyleName(): string | undefined {
    return readChildVal(this.properties, 'w:pStyle');
  }

  setStyleName(name: string): void {
    writeAttr(this.property('w:pStyle'), 'w:val', name);
  }

  removeStyleName(): void {
    removeChild(this.properties, 'w:pStyle');
  }

  getAlignment(): Alignment | undefined {
    const jc = readChildVal(this.properties, 'w:jc');
    return jc === undefined ? undefined : ALIGNMENT_FROM_JC[jc];
  }

  setAlignment(alignment: Alignment): void {
    writeAttr(this.property('w:jc'), 'w:val', alignment === 'justify' ? 'both' : alignment);
  }

  getSpacing(): ParagraphSpacing {
    const spacing = findChild(this.properties, 'w:spacing');
    const result: ParagraphSpacing = {};
    const before = fromTwips(readNumberAttr(spacing, 'w:before'));
    const after = fromTwips(readNumberAttr(spacing, 'w:after'));
    if (before !== undefined) result.before = before;
    if (after !== undefined) result.after = after;
    return result;
  }

  setSpacing(before?: number, after?: number): void {
    if (before === undefined && after === undefined) return;
    const spacing = this.property('w:spacing');
    if (before !== undefined) writeAttr(spacing, 'w:before', toTwips(before));
    if (after !== undefined) writeAttr(spacing, 'w:after', toTwips(after));
  }

  getLineSpacing(): number | undefined {
    const spacing = findChild(this.properties, 'w:spacing');
    const rule = readAttr(spacing, 'w:lineRule');
    if (rule !== undefined && rule !== 'auto') return undefined;
    const line = readNumberAttr(spacing, 'w:line');
    return line === undefined ? undefined : line / LINE_SPACING_UNITS;
  }

  setLineSpacing(multiplier: number): void {
    const spacing = this.property('w:spacing');
    writeAttr(spacing, 'w:line', Math.round(multiplier * LINE_SPACING_UNITS));
    writeAttr(spacing, 'w:lineRule', 'auto');
  }

  getIndentation(): ParagraphIndentation {
    const ind = findChild(this.properties, 'w:ind');
    const result: ParagraphIndentation = {};
    const left = fromTwips(readNumberAttr(ind, 'w:left') ?? readNumberAttr(ind, 'w:start'));
    const right = fromTwips(readNumberAttr(ind, 'w:right') ?? readNumberAttr(ind, 'w:end'));
    if (left !== undefined) result.left = left;
    if (right !== undefined) result.right = right;
    return result;
  }

  setIndentation(left?: number, right?: number): void {
    if (left === undefined && right === undefined) return;
    const ind = this.property('w:ind');
    if (left !== undefined) writeAttr(ind, 'w:left', toTwips(left));
    if (right !== undefined) writeAttr(ind, 'w:right', toTwips(right));
  }

  getFirstLineIndent(): number | undefined {
    const ind = findChild(this.properties, 'w:ind');
    const hanging = readNumberAttr(ind, 'w:hanging');
    if (hanging !== undefined) return -hanging / TWIPS_PER_POINT;
    return fromTwips(readNumberAttr(ind, 'w:firstLine'));
  }

  /** Negative values are written as a hanging indent; zero is kept as `w:firstLine="0"`. */
  setFirstLineIndent(points: number): void {
    const ind = this.property('w:ind');
    removeAttr(ind, 'w:firstLine');
    removeAttr(ind, 'w:hanging');
    if (points >= 0) writeAttr(ind, 'w:firstLine', toTwips(points));
    if (points < 0) writeAttr(ind, 'w:hanging', toTwips(-points));
  }

  getListStyle(): ListStyle | undefined {
    const numPr = findChild(this.properties, 'w:numPr');
    if (!numPr) return undefined;
    const numId = readNumberAttr(findChild(numPr, 'w:numId'), 'w:val') ?? 0;
    const level = readNumberAttr(findChild(numPr, 'w:ilvl'), 'w:val') ?? 0;
    let type: ListType = 'number';
    if (numId === 0) type = 'none';
    else if (numId === LIST_NUMBERING_IDS.bullet) type = 'bullet';
    return { type, level };
  }

  /** `none` removes the numbering reference. */
  setListStyle(type: ListType, level: number): void {
    if (type === 'none') {
      removeChild(this.properties, 'w:numPr');
      return;
    }
    const numPr = this.property('w:numPr');
    writeAttr(ensureChild(numPr, 'w:ilvl', ['w:ilvl', 'w:numId']), 'w:val', level);
    writeAttr(ensureChild(numPr, 'w:numId', ['w:ilvl', 'w:numId']), 'w:val', LIST_NUMBERING_IDS[type]);
  }

  /** Runs directly in the paragraph and inside its hyperlinks. */
  runs(): DocxRun[] {
    const runs: DocxRun[] = [];
    for (const child of childElements(this.node)) {
      if (child.nodeName === 'w:r') runs.push(new DocxRun(child));
      if (child.nodeName === 'w:hyperlink') {
        runs.push(...childElements(child, 'w:r').map((run) => new DocxRun(run)));
      }
    }
    return runs;
  }

  getText(): string {
    return this.runs()
      .map((run) => run.getText())
      .join('');
  }
}
