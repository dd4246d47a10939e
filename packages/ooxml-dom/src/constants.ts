export {
  WORDPROCESSINGML_NS,
  TWIPS_PER_POINT,
  HALF_POINTS_PER_POINT,
  EIGHTHS_PER_POINT,
  LINE_SPACING_UNITS,
} from '@docstyle/contracts';

/** Element nodes, as reported by `Node.nodeType`. */
export const ELEMENT_NODE = 1;

/**
 * Schema order of the children we write into property blocks. New children are inserted
 * before the first existing sibling that comes later in this order.
 */
export const PARAGRAPH_PROPERTY_ORDER = [
  'w:pStyle',
  'w:keepNext',
  'w:keepLines',
  'w:pageBreakBefore',
  'w:numPr',
  'w:pBdr',
  'w:shd',
  'w:tabs',
  'w:spacing',
  'w:ind',
  'w:jc',
  'w:rPr',
  'w:sectPr',
] as const;

export const RUN_PROPERTY_ORDER = [
  'w:rStyle',
  'w:rFonts',
  'w:b',
  'w:bCs',
  'w:i',
  'w:iCs',
  'w:caps',
  'w:smallCaps',
  'w:strike',
  'w:dstrike',
  'w:outline',
  'w:shadow',
  'w:color',
  'w:sz',
  'w:szCs',
  'w:highlight',
  'w:u',
  'w:vertAlign',
] as const;

export const TABLE_PROPERTY_ORDER = [
  'w:tblStyle',
  'w:tblpPr',
  'w:tblOverlap',
  'w:bidiVisual',
  'w:tblStyleRowBandSize',
  'w:tblStyleColBandSize',
  'w:tblW',
  'w:jc',
  'w:tblCellSpacing',
  'w:tblInd',
  'w:tblBorders',
  'w:shd',
  'w:tblLayout',
  'w:tblCellMar',
  'w:tblLook',
] as const;

export const TABLE_BORDER_SIDES = ['w:top', 'w:left', 'w:bottom', 'w:right', 'w:insideH', 'w:insideV'] as const;
export const CELL_MARGIN_SIDES = ['w:top', 'w:left', 'w:bottom', 'w:right'] as const;
