import { describe, expect, it } from 'vitest';
import { FormattingFlags, WORDPROCESSINGML_NS } from '@docstyle/contracts';
import { Style, markBuiltIn } from '../style.js';
import { XML_DECLARATION, generateStylesXml, markupStyleType, styleIdFor } from './styles-xml.js';

const stylesPart = (body: string) =>
  body
    ? `${XML_DECLARATION}\n<w:styles xmlns:w="${WORDPROCESSINGML_NS}">${body}</w:styles>`
    : `${XML_DECLARATION}\n<w:styles xmlns:w="${WORDPROCESSINGML_NS}"/>`;

describe('styles-xml - markupStyleType', () => {
  it('writes mixed and numbering styles as paragraph styles', () => {
    expect(markupStyleType('mixed')).toBe('paragraph');
    expect(markupStyleType('numbering')).toBe('paragraph');
    expect(markupStyleType('character')).toBe('character');
    expect(markupStyleType('table')).toBe('table');
  });
});

describe('styles-xml - generateStylesXml', () => {
  it('writes an empty styles part', () => {
    expect(generateStylesXml([])).toBe(stylesPart(''));
  });

  it('writes run properties in schema order', () => {
    const style = new Style('Emphasis', 'character');
    style.setCharacterProperties({
      fontColor: 'c00000',
      fontSize: 10.5,
      formatting: FormattingFlags.italic | FormattingFlags.underline,
    });

    expect(generateStylesXml([style])).toBe(
      stylesPart(
        '<w:style w:type="character" w:styleId="Emphasis" w:customStyle="1">' +
          '<w:name w:val="Emphasis"/>' +
          '<w:rPr><w:i/><w:color w:val="C00000"/><w:sz w:val="21"/><w:szCs w:val="21"/><w:u w:val="single"/></w:rPr>' +
          '</w:style>',
      ),
    );
  });

  it('marks built-in styles for quick formatting and writes paragraph properties', () => {
    const style = new Style('Outline', 'mixed');
    style.setBaseStyle('Normal');
    style.setParagraphProperties({
      alignment: 'justify',
      spaceBefore: 12,
      lineSpacing: 1.15,
      firstLineIndent: -18,
      listType: 'number',
      listLevel: 2,
    });
    markBuiltIn(style);

    expect(generateStylesXml([style])).toBe(
      stylesPart(
        '<w:style w:type="paragraph" w:styleId="Outline">' +
          '<w:name w:val="Outline"/><w:basedOn w:val="Normal"/><w:qFormat/>' +
          '<w:pPr>' +
          '<w:numPr><w:ilvl w:val="2"/><w:numId w:val="2"/></w:numPr>' +
          '<w:spacing w:before="240" w:line="276" w:lineRule="auto"/>' +
          '<w:ind w:hanging="360"/>' +
          '<w:jc w:val="both"/>' +
          '</w:pPr>' +
          '</w:style>',
      ),
    );
  });

  it('writes borders on every edge and uniform cell margins', () => {
    const style = new Style('Grid', 'table');
    style.setTableProperties({ width: 300, alignment: 'center', borderWidth: 0.5, borderColor: 'ff0000', cellPadding: 5 });
    const xml = generateStylesXml([style]);

    expect(xml).toContain('<w:tblPr><w:tblW w:w="6000" w:type="dxa"/><w:jc w:val="center"/><w:tblBorders>');
    for (const side of ['top', 'left', 'bottom', 'right', 'insideH', 'insideV']) {
      expect(xml).toContain(`<w:${side} w:val="single" w:sz="4" w:color="FF0000"/>`);
    }
    expect(xml).toContain(
      '<w:tblCellMar><w:top w:w="100" w:type="dxa"/><w:left w:w="100" w:type="dxa"/>' +
        '<w:bottom w:w="100" w:type="dxa"/><w:right w:w="100" w:type="dxa"/></w:tblCellMar>',
    );
  });

  it('omits empty property blocks', () => {
    const xml = generateStylesXml([new Style('Plain', 'mixed')]);
    expect(xml).toBe(
      stylesPart('<w:style w:type="paragraph" w:styleId="Plain" w:customStyle="1"><w:name w:val="Plain"/></w:style>'),
    );
  });

  it('derives style ids by removing whitespace', () => {
    expect(styleIdFor('Heading 1')).toBe('Heading1');
    const style = new Style('Report Heading', 'paragraph');
    style.setBaseStyle('Body  Text');
    expect(generateStylesXml([style])).toBe(
      stylesPart(
        '<w:style w:type="paragraph" w:styleId="ReportHeading" w:customStyle="1">' +
          '<w:name w:val="Report Heading"/><w:basedOn w:val="BodyText"/>' +
          '</w:style>',
      ),
    );
  });

  it('keeps the given order', () => {
    const xml = generateStylesXml([new Style('B', 'paragraph'), new Style('A', 'paragraph')]);
    expect(xml.indexOf('w:styleId="B"')).toBeLessThan(xml.indexOf('w:styleId="A"'));
  });
});
