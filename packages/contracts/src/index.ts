/**
 * @docstyle/contracts
 *
 * Types shared by the style engine and the element adapters: style kinds, property bags,
 * element collaborator interfaces, and the result/error contract.
 */

export {
  STYLE_TYPES,
  BUILT_IN_STYLE_CATEGORIES,
  ALIGNMENTS,
  LIST_TYPES,
  HIGHLIGHT_COLORS,
  FormattingFlags,
  hasFormattingFlag,
} from './styles.js';
export type {
  StyleType,
  BuiltInStyleCategory,
  Alignment,
  ListType,
  HighlightColor,
  FormattingFlagName,
  ParagraphStyleProperties,
  CharacterStyleProperties,
  TableStyleProperties,
  PropertyKind,
  PropertyBags,
} from './styles.js';

export type {
  StyleReferenceHolder,
  ListStyle,
  ParagraphSpacing,
  ParagraphIndentation,
  ParagraphElement,
  RunElement,
  CellMargins,
  TableCellElement,
  TableRowElement,
  TableElement,
  StyledElement,
  StyledElementKind,
  StyledDocument,
} from './elements.js';

export { StyleError, isStyleError, STYLE_ERROR_CATEGORIES } from './errors.js';
export type { StyleErrorCategory, StyleErrorCode, StyleErrorDetails } from './errors.js';

export { ok, fail, wrapFailure, failureFromException } from './result.js';
export type { StyleResult, StyleSuccess, StyleFailure } from './result.js';

export {
  WORDPROCESSINGML_NS,
  TWIPS_PER_POINT,
  HALF_POINTS_PER_POINT,
  EIGHTHS_PER_POINT,
  LINE_SPACING_UNITS,
  LIST_NUMBERING_IDS,
} from './markup.js';

export { LOG_LEVELS, createConsoleLogger } from './logging.js';
export type { LogLevel, StyleLogger, StyleErrorObserver } from './logging.js';
