/**
 * @docstyle/ooxml-dom
 *
 * WordprocessingML element adapters backed by an xmldom tree. They implement the element
 * contracts from `@docstyle/contracts`, so the style engine can read and write real markup.
 */

export { DocxDocument } from './document.js';
export { DocxParagraph } from './paragraph.js';
export { DocxRun } from './run.js';
export { DocxTable, DocxTableRow, DocxTableCell } from './table.js';
