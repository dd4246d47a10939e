import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import {
  FormattingFlags,
  LIST_NUMBERING_IDS,
  WORDPROCESSINGML_NS,
  hasFormattingFlag,
  type CharacterStyleProperties,
  type ParagraphStyleProperties,
  type StyleType,
  type TableStyleProperties,
} from '@docstyle/contracts';
import type { Style } from '../style.js';
import { lineSpacingToUnits, pointsToEighths, pointsToHalfPoints, pointsToTwips } from '../units.js';

const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

type Attributes = Record<string, string | number | undefined>;

/** Style id for a style name: the name with whitespace removed, as Word writes `Heading1`. */
export function styleIdFor(name: string): string {
  return name.replace(/\s+/g, '');
}

/** WordprocessingML `w:type` for each style type. */
export function markupStyleType(type: StyleType): 'paragraph' | 'character' | 'table' {
  switch (type) {
    case 'character':
      return 'character';
    case 'table':
      return 'table';
    default:
      return 'paragraph';
  }
}

function element(doc: Document, name: string, attributes: Attributes = {}): Element {
  const node = doc.createElementNS(WORDPROCESSINGML_NS, name);
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) node.setAttributeNS(WORDPROCESSINGML_NS, key, String(value));
  }
  return node;
}

function append(parent: Element, name: string, attributes: Attributes = {}): Element {
  const doc = parent.ownerDocument;
  if (!doc) throw new Error(`Cannot append <${name}> to a detached element`);
  const child = element(doc, name, attributes);
  parent.appendChild(child);
  return child;
}

const hasChildren = (node: Element) => node.firstChild !== null;

function buildParagraphProperties(doc: Document, props: ParagraphStyleProperties): Element | undefined {
  const pPr = element(doc, 'w:pPr');

  if (props.listType !== undefined && props.listType !== 'none') {
    const numPr = append(pPr, 'w:numPr');
    append(numPr, 'w:ilvl', { 'w:val': props.listLevel ?? 0 });
    append(numPr, 'w:numId', { 'w:val': LIST_NUMBERING_IDS[props.listType] });
  }

  if (props.spaceBefore !== undefined || props.spaceAfter !== undefined || props.lineSpacing !== undefined) {
    append(pPr, 'w:spacing', {
      'w:before': props.spaceBefore === undefined ? undefined : pointsToTwips(props.spaceBefore),
      'w:after': props.spaceAfter === undefined ? undefined : pointsToTwips(props.spaceAfter),
      'w:line': props.lineSpacing === undefined ? undefined : lineSpacingToUnits(props.lineSpacing),
      'w:lineRule': props.lineSpacing === undefined ? undefined : 'auto',
    });
  }

  const firstLine = props.firstLineIndent;
  if (props.leftIndent !== undefined || props.rightIndent !== undefined || firstLine !== undefined) {
    append(pPr, 'w:ind', {
      'w:left': props.leftIndent === undefined ? undefined : pointsToTwips(props.leftIndent),
      'w:right': props.rightIndent === undefined ? undefined : pointsToTwips(props.rightIndent),
      'w:firstLine': firstLine !== undefined && firstLine >= 0 ? pointsToTwips(firstLine) : undefined,
      'w:hanging': firstLine !== undefined && firstLine < 0 ? pointsToTwips(-firstLine) : undefined,
    });
  }

  if (props.alignment !== undefined) {
    append(pPr, 'w:jc', { 'w:val': props.alignment === 'justify' ? 'both' : props.alignment });
  }

  return hasChildren(pPr) ? pPr : undefined;
}

function buildRunProperties(doc: Document, props: CharacterStyleProperties): Element | undefined {
  const rPr = element(doc, 'w:rPr');
  const mask = props.formatting;

  if (props.fontName !== undefined) {
    append(rPr, 'w:rFonts', {
      'w:ascii': props.fontName,
      'w:hAnsi': props.fontName,
      'w:eastAsia': props.fontName,
      'w:cs': props.fontName,
    });
  }
  if (hasFormattingFlag(mask, 'bold')) append(rPr, 'w:b');
  if (hasFormattingFlag(mask, 'italic')) append(rPr, 'w:i');
  if (hasFormattingFlag(mask, 'smallCaps')) append(rPr, 'w:smallCaps');
  if (hasFormattingFlag(mask, 'strikethrough')) append(rPr, 'w:strike');
  if (hasFormattingFlag(mask, 'shadow')) append(rPr, 'w:shadow');
  if (props.fontColor !== undefined) append(rPr, 'w:color', { 'w:val': props.fontColor });
  if (props.fontSize !== undefined) {
    const halfPoints = pointsToHalfPoints(props.fontSize);
    append(rPr, 'w:sz', { 'w:val': halfPoints });
    append(rPr, 'w:szCs', { 'w:val': halfPoints });
  }
  if (props.highlight !== undefined && props.highlight !== 'none') {
    append(rPr, 'w:highlight', { 'w:val': props.highlight });
  }
  if (hasFormattingFlag(mask, 'underline')) append(rPr, 'w:u', { 'w:val': 'single' });
  if (mask !== undefined && (mask & (FormattingFlags.superscript | FormattingFlags.subscript)) !== 0) {
    append(rPr, 'w:vertAlign', {
      'w:val': hasFormattingFlag(mask, 'superscript') ? 'superscript' : 'subscript',
    });
  }

  return hasChildren(rPr) ? rPr : undefined;
}

function buildTableProperties(doc: Document, props: TableStyleProperties): Element | undefined {
  const tblPr = element(doc, 'w:tblPr');

  if (props.width !== undefined) {
    append(tblPr, 'w:tblW', { 'w:w': pointsToTwips(props.width), 'w:type': 'dxa' });
  }
  if (props.alignment !== undefined) append(tblPr, 'w:jc', { 'w:val': props.alignment });

  if (props.borderStyle !== undefined || props.borderWidth !== undefined || props.borderColor !== undefined) {
    const borders = append(tblPr, 'w:tblBorders');
    for (const side of ['w:top', 'w:left', 'w:bottom', 'w:right', 'w:insideH', 'w:insideV']) {
      append(borders, side, {
        'w:val': props.borderStyle ?? 'single',
        'w:sz': props.borderWidth === undefined ? undefined : pointsToEighths(props.borderWidth),
        'w:color': props.borderColor,
      });
    }
  }

  if (props.cellPadding !== undefined) {
    const margins = append(tblPr, 'w:tblCellMar');
    for (const side of ['w:top', 'w:left', 'w:bottom', 'w:right']) {
      append(margins, side, { 'w:w': pointsToTwips(props.cellPadding), 'w:type': 'dxa' });
    }
  }

  return hasChildren(tblPr) ? tblPr : undefined;
}

/**
 * Builds the `<w:style>` element for a style.
 *
 * The style id is the name without whitespace (see {@link styleIdFor}). Paragraph
 * properties are written for paragraph and mixed styles, run properties for character
 * and mixed styles, table properties for table styles; empty blocks are omitted.
 */
export function buildStyleElement(doc: Document, style: Style): Element {
  const node = element(doc, 'w:style', {
    'w:type': markupStyleType(style.type),
    'w:styleId': styleIdFor(style.name),
    'w:customStyle': style.isBuiltIn ? undefined : 1,
  });
  append(node, 'w:name', { 'w:val': style.name });
  if (style.baseStyle) append(node, 'w:basedOn', { 'w:val': styleIdFor(style.baseStyle) });
  if (style.isBuiltIn) append(node, 'w:qFormat');

  const blocks = [
    style.accepts('paragraph') ? buildParagraphProperties(doc, style.paragraphProperties) : undefined,
    style.accepts('character') ? buildRunProperties(doc, style.characterProperties) : undefined,
    style.accepts('table') ? buildTableProperties(doc, style.tableProperties) : undefined,
  ];
  for (const block of blocks) {
    if (block) node.appendChild(block);
  }
  return node;
}

function createStylesDocument(): Document {
  const doc = new DOMImplementation().createDocument(WORDPROCESSINGML_NS, 'w:styles', null);
  doc.documentElement.setAttributeNS(XMLNS_NS, 'xmlns:w', WORDPROCESSINGML_NS);
  return doc;
}

export function serializeStyle(style: Style): string {
  const doc = createStylesDocument();
  return new XMLSerializer().serializeToString(buildStyleElement(doc, style));
}

/** Serializes styles, in the given order, as a complete `word/styles.xml` part. */
export function generateStylesXml(styles: Iterable<Style>): string {
  const doc = createStylesDocument();
  for (const style of styles) {
    doc.documentElement.appendChild(buildStyleElement(doc, style));
  }
  return `${XML_DECLARATION}\n${new XMLSerializer().serializeToString(doc)}`;
}
