import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { FormattingFlags, type StyleResult } from '@docstyle/contracts';
import { STYLESHEET_NAMESPACE, StyleDefinitionParser } from './definition-parser.js';

const FIXTURE = fileURLToPath(new URL('../../fixtures/report-styles.xml', import.meta.url));

const sheet = (body: string) => `<StyleSheet xmlns="${STYLESHEET_NAMESPACE}" version="1.0">${body}</StyleSheet>`;

const unwrap = <T>(result: StyleResult<T>): T => {
  if (!result.success) throw result.error;
  return result.value;
};

const failureOf = <T>(result: StyleResult<T>) => {
  if (result.success) throw new Error('expected a failure');
  return result.error;
};

describe('StyleDefinitionParser - loading files', () => {
  const parser = new StyleDefinitionParser();
  const { styles, styleSets } = unwrap(parser.loadStyleSheetFromFile(FIXTURE));
  const byName = new Map(styles.map((style) => [style.name, style]));

  it('reads styles in document order', () => {
    expect(styles.map((style) => style.name)).toEqual(['Report Body', 'Callout', 'Report Table', 'Report Heading']);
    expect(styles.map((style) => style.type)).toEqual(['paragraph', 'character', 'table', 'mixed']);
  });

  it('converts paragraph lengths to points', () => {
    expect(byName.get('Report Body')?.paragraphProperties).toEqual({
      alignment: 'justify',
      spaceBefore: 6,
      spaceAfter: 12,
      lineSpacing: 1.15,
      leftIndent: 36,
      firstLineIndent: -18,
      listType: 'number',
      listLevel: 1,
    });
  });

  it('reads character properties and formatting flags', () => {
    expect(byName.get('Callout')?.characterProperties).toEqual({
      fontName: 'Arial',
      fontSize: 18,
      fontColor: '000080',
      highlight: 'lightGray',
      formatting: FormattingFlags.bold | FormattingFlags.underline,
    });
  });

  it('resolves percentage widths against the reference width', () => {
    expect(byName.get('Report Table')?.tableProperties).toEqual({
      width: 200,
      alignment: 'center',
      borderStyle: 'double',
      borderWidth: 1,
      borderColor: '0000FF',
      cellPadding: 3,
    });
  });

  it('keeps the base style of mixed styles', () => {
    const heading = byName.get('Report Heading');
    expect(heading?.baseStyle).toBe('Report Body');
    expect(heading?.paragraphProperties).toEqual({ alignment: 'center' });
    expect(heading?.characterProperties).toEqual({ fontName: 'Cambria' });
  });

  it('reads style sets', () => {
    expect(styleSets).toHaveLength(1);
    expect(styleSets[0]?.name).toBe('Report');
    expect(styleSets[0]?.description).toBe('Quarterly report');
    expect(styleSets[0]?.includedStyles).toEqual(['Report Body', 'Callout', 'Report Table']);
  });

  it('exposes styles and style sets separately', () => {
    expect(unwrap(parser.loadStylesFromFile(FIXTURE))).toHaveLength(4);
    expect(unwrap(parser.loadStyleSetsFromFile(FIXTURE)).map((styleSet) => styleSet.name)).toEqual(['Report']);
  });

  it('honours a custom table width reference', () => {
    const wide = new StyleDefinitionParser({ tableWidthReference: 500 });
    const table = unwrap(wide.loadStylesFromFile(FIXTURE)).find((style) => style.name === 'Report Table');
    expect(table?.tableProperties.width).toBe(250);
  });

  it('reports a missing file', () => {
    const error = failureOf(parser.loadStylesFromFile('/nonexistent/styles.xml'));
    expect(error.code).toBe('FILE_NOT_FOUND');
    expect(error.message.startsWith("Failed to load XML file '/nonexistent/styles.xml'")).toBe(true);
  });
});

describe('StyleDefinitionParser - document structure', () => {
  const parser = new StyleDefinitionParser();

  it('rejects malformed XML', () => {
    expect(failureOf(parser.loadStylesFromString('')).code).toBe('XML_PARSE_ERROR');
    expect(failureOf(parser.loadStylesFromString('plain text, no markup')).code).toBe('XML_PARSE_ERROR');
  });

  it('rejects unclosed elements', () => {
    const error = failureOf(
      parser.loadStylesFromString(sheet('<Style name="Open" type="paragraph"><Paragraph></Style>')),
    );
    expect(error.code).toBe('XML_PARSE_ERROR');
  });

  it('requires a StyleSheet root', () => {
    const error = failureOf(parser.loadStylesFromString(`<Styles xmlns="${STYLESHEET_NAMESPACE}" version="1.0"/>`));
    expect(error.code).toBe('XML_INVALID_STRUCTURE');
    expect(error.message).toBe("Root element must be 'StyleSheet', found 'Styles'");
  });

  it('requires the stylesheet namespace', () => {
    expect(failureOf(parser.loadStylesFromString('<StyleSheet version="1.0"/>')).code).toBe('XML_NAMESPACE_ERROR');
  });

  it('requires a supported version', () => {
    const missing = failureOf(parser.loadStylesFromString(`<StyleSheet xmlns="${STYLESHEET_NAMESPACE}"/>`));
    expect(missing.code).toBe('XML_ATTRIBUTE_MISSING');
    const future = failureOf(parser.loadStylesFromString(`<StyleSheet xmlns="${STYLESHEET_NAMESPACE}" version="2.0"/>`));
    expect(future.code).toBe('UNSUPPORTED_VERSION');
    expect(future.message).toBe('Unsupported schema version: 2.0. Supported: 1.0');
  });

  it('accepts an empty sheet', () => {
    expect(unwrap(parser.loadStyleSheetFromString(sheet('')))).toEqual({ styles: [], styleSets: [] });
  });
});

describe('StyleDefinitionParser - style elements', () => {
  const parser = new StyleDefinitionParser();

  it('requires name and type', () => {
    expect(failureOf(parser.loadStylesFromString(sheet('<Style type="paragraph"/>'))).code).toBe(
      'XML_ATTRIBUTE_MISSING',
    );
    const noType = failureOf(parser.loadStylesFromString(sheet('<Style name="Lonely"/>')));
    expect(noType.code).toBe('XML_ATTRIBUTE_MISSING');
    expect(noType.details?.field).toBe('type');
  });

  it('rejects unknown style types', () => {
    const error = failureOf(parser.loadStylesFromString(sheet('<Style name="Odd" type="fancy"/>')));
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.message).toBe("Invalid style type: 'fancy'");
  });

  it('wraps an invalid alignment in a structure error', () => {
    const error = failureOf(
      parser.loadStylesFromString(sheet('<Style name="Odd" type="paragraph"><Paragraph><Alignment>middle</Alignment></Paragraph></Style>')),
    );
    expect(error.code).toBe('XML_INVALID_STRUCTURE');
    expect(error.message).toBe("Style 'Odd' has an invalid <Paragraph> block");
    expect(error.causedBy?.code).toBe('INVALID_ALIGNMENT');
  });

  it('rejects blocks the style type cannot hold', () => {
    const error = failureOf(
      parser.loadStylesFromString(sheet('<Style name="Odd" type="paragraph"><Character><Font name="Arial"/></Character></Style>')),
    );
    expect(error.message).toBe("Style 'Odd' has an invalid <Character> block");
    expect(error.causedBy?.code).toBe('STYLE_PROPERTY_INVALID');
  });

  it('rejects a style based on itself', () => {
    const error = failureOf(parser.loadStylesFromString(sheet('<Style name="Loop" type="paragraph" base="Loop"/>')));
    expect(error.code).toBe('XML_INVALID_STRUCTURE');
    expect(error.causedBy?.code).toBe('STYLE_INHERITANCE_CYCLE');
  });

  it('rejects an out-of-range font size from the validator', () => {
    const error = failureOf(
      parser.loadStylesFromString(sheet('<Style name="Tiny" type="character"><Character><Font size="0"/></Character></Style>')),
    );
    expect(error.causedBy?.code).toBe('INVALID_FONT_SIZE');
  });

  it('accepts yes and TRUE as formatting switches', () => {
    const [style] = unwrap(
      parser.loadStylesFromString(
        sheet('<Style name="Loud" type="character"><Character><Format italic="TRUE" smallCaps="yes" shadow="no"/></Character></Style>'),
      ),
    );
    expect(style?.characterProperties.formatting).toBe(FormattingFlags.italic | FormattingFlags.smallCaps);
  });

  it('defaults list type to bullet and reads plain line spacing multipliers', () => {
    const [style] = unwrap(
      parser.loadStylesFromString(
        sheet('<Style name="Items" type="paragraph"><Paragraph><List/><LineSpacing>2</LineSpacing></Paragraph></Style>'),
      ),
    );
    expect(style?.paragraphProperties).toEqual({ lineSpacing: 2, listType: 'bullet' });
  });
});

describe('StyleDefinitionParser - style sets', () => {
  const parser = new StyleDefinitionParser();

  it('requires at least one include', () => {
    const error = failureOf(parser.loadStyleSetsFromString(sheet('<StyleSet name="Empty"/>')));
    expect(error.code).toBe('VALIDATION_FAILED');
  });

  it('rejects an empty include', () => {
    const error = failureOf(parser.loadStyleSetsFromString(sheet('<StyleSet name="Broken"><Include> </Include></StyleSet>')));
    expect(error.code).toBe('XML_INVALID_STRUCTURE');
  });

  it('does not check that included styles exist', () => {
    const [styleSet] = unwrap(parser.loadStyleSetsFromString(sheet('<StyleSet name="Loose"><Include>Ghost</Include></StyleSet>')));
    expect(styleSet?.includedStyles).toEqual(['Ghost']);
  });
});
