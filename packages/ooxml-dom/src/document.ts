import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { fail, ok, type StyleResult, type StyledDocument } from '@docstyle/contracts';
import { WORDPROCESSINGML_NS } from './constants.js';
import { childElements, createElement, findChild } from './markup.js';
import { DocxParagraph } from './paragraph.js';
import { DocxRun } from './run.js';
import { DocxTable } from './table.js';

const BLANK_DOCUMENT = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="${WORDPROCESSINGML_NS}"><w:body><w:sectPr/></w:body></w:document>`;

function elementsByName(root: Element, name: string): Element[] {
  return Array.from(root.getElementsByTagName(name));
}

/**
 * In-memory `word/document.xml`.
 *
 * @example
 * ```typescript
 * const doc = DocxDocument.create();
 * const heading = doc.addParagraph('Quarterly report');
 * heading.setStyleName('Heading 1');
 * doc.toXml();
 * ```
 */
export class DocxDocument implements StyledDocument {
  private constructor(
    private readonly dom: Document,
    private readonly body: Element,
  ) {}

  static create(): DocxDocument {
    const parsed = DocxDocument.parse(BLANK_DOCUMENT);
    if (!parsed.success) throw parsed.error;
    return parsed.value;
  }

  /** Parses the main document part. Malformed markup is returned as `XML_PARSE_ERROR`. */
  static parse(xml: string): StyleResult<DocxDocument> {
    const problems: string[] = [];
    let dom: Document | undefined;
    try {
      dom = new DOMParser({
        errorHandler: {
          warning: (message: string) => problems.push(message),
          error: (message: string) => problems.push(message),
          fatalError: (message: string) => problems.push(message),
        },
      }).parseFromString(xml, 'text/xml');
    } catch (error) {
      problems.push(error instanceof Error ? error.message : String(error));
    }

    const root = dom?.documentElement ?? undefined;
    if (!dom || !root || problems.length > 0) {
      return fail('XML_PARSE_ERROR', `Document markup could not be parsed: ${problems[0] ?? 'no root element'}`, {
        operation: 'parseDocument',
      });
    }
    if (root.nodeName !== 'w:document') {
      return fail('XML_INVALID_STRUCTURE', `Expected <w:document> root, found <${root.nodeName}>`, {
        operation: 'parseDocument',
      });
    }
    const body = findChild(root, 'w:body');
    if (!body) {
      return fail('XML_INVALID_STRUCTURE', 'Document has no <w:body>', { operation: 'parseDocument' });
    }
    return ok(new DocxDocument(dom, body));
  }

  /** Every paragraph in document order, including paragraphs nested in table cells. */
  paragraphs(): DocxParagraph[] {
    return elementsByName(this.body, 'w:p').map((p) => new DocxParagraph(p));
  }

  runs(): DocxRun[] {
    return this.paragraphs().flatMap((paragraph) => paragraph.runs());
  }

  /** Every table in document order, including nested tables. */
  tables(): DocxTable[] {
    return elementsByName(this.body, 'w:tbl').map((tbl) => new DocxTable(tbl));
  }

  /** Appends a paragraph holding one run of `text`, before the section properties. */
  addParagraph(text = ''): DocxParagraph {
    const paragraph = this.buildParagraph(text);
    this.appendBlock(paragraph);
    return new DocxParagraph(paragraph);
  }

  /** Appends a `rows` x `cols` table whose cells each hold one empty paragraph. */
  addTable(rows: number, cols: number): DocxTable {
    const table = createElement(this.body, 'w:tbl');
    table.appendChild(createElement(this.body, 'w:tblPr'));

    const grid = createElement(this.body, 'w:tblGrid');
    for (let c = 0; c < cols; c += 1) grid.appendChild(createElement(this.body, 'w:gridCol'));
    table.appendChild(grid);

    for (let r = 0; r < rows; r += 1) {
      const row = createElement(this.body, 'w:tr');
      for (let c = 0; c < cols; c += 1) {
        const cell = createElement(this.body, 'w:tc');
        cell.appendChild(this.buildParagraph(''));
        row.appendChild(cell);
      }
      table.appendChild(row);
    }

    this.appendBlock(table);
    return new DocxTable(table);
  }

  toXml(): string {
    return new XMLSerializer().serializeToString(this.dom);
  }

  private buildParagraph(text: string): Element {
    const paragraph = createElement(this.body, 'w:p');
    if (text) {
      const run = createElement(this.body, 'w:r');
      const t = createElement(this.body, 'w:t');
      if (text !== text.trim()) t.setAttribute('xml:space', 'preserve');
      t.appendChild(this.dom.createTextNode(text));
      run.appendChild(t);
      paragraph.appendChild(run);
    }
    return paragraph;
  }

  private appendBlock(block: Element): void {
    const sectPr = childElements(this.body, 'w:sectPr')[0];
    if (sectPr) {
      this.body.insertBefore(block, sectPr);
    } else {
      this.body.appendChild(block);
    }
  }
}
