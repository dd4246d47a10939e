import { readFileSync } from 'node:fs';
import {
  FormattingFlags,
  HIGHLIGHT_COLORS,
  STYLE_TYPES,
  fail,
  ok,
  wrapFailure,
  type Alignment,
  type CharacterStyleProperties,
  type FormattingFlagName,
  type HighlightColor,
  type ListType,
  type ParagraphStyleProperties,
  type StyleResult,
  type StyleType,
  type TableStyleProperties,
} from '@docstyle/contracts';
import {
  DefinitionParserOptionsSchema,
  parseConfig,
  type DefinitionParserOptions,
  type DefinitionParserOptionsInput,
} from '../config.js';
import { Style } from '../style.js';
import { StyleSet } from '../style-set.js';
import { parseColor, parsePercentage, parseValueWithUnit } from '../units.js';
import { attribute, childElements, firstChild, parseXml, textOf } from './xml.js';

export const STYLESHEET_NAMESPACE = 'urn:docstyle:stylesheet';
export const STYLESHEET_VERSION = '1.0';

export interface StyleSheet {
  styles: Style[];
  styleSets: StyleSet[];
}

const ALIGNMENT_NAMES: Readonly<Record<string, Alignment>> = {
  left: 'left',
  center: 'center',
  right: 'right',
  justify: 'justify',
};

const LIST_TYPE_NAMES: Readonly<Record<string, ListType>> = {
  none: 'none',
  bullet: 'bullet',
  unordered: 'bullet',
  number: 'number',
  numbered: 'number',
  ordered: 'number',
  decimal: 'number',
};

/** Highlight spellings accepted in definitions, keyed by lowercase name. */
const HIGHLIGHT_NAMES: Readonly<Record<string, HighlightColor>> = {
  ...Object.fromEntries(HIGHLIGHT_COLORS.map((color): [string, HighlightColor] => [color.toLowerCase(), color])),
  lightgrey: 'lightGray',
  'light-gray': 'lightGray',
  'dark-blue': 'darkBlue',
  'dark-cyan': 'darkCyan',
  'dark-green': 'darkGreen',
  'dark-magenta': 'darkMagenta',
  'dark-red': 'darkRed',
  'dark-yellow': 'darkYellow',
};

const FORMAT_ATTRIBUTES: readonly FormattingFlagName[] = [
  'bold',
  'italic',
  'underline',
  'strikethrough',
  'smallCaps',
  'shadow',
  'subscript',
  'superscript',
];

const TRUE_VALUES = ['true', '1', 'yes'];

function lookup<T>(table: Readonly<Record<string, T>>, raw: string): T | undefined {
  const key = raw.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function isStyleType(value: string): value is StyleType {
  return STYLE_TYPES.some((type) => type === value);
}

/**
 * Reads declarative style definitions (`<StyleSheet>` documents) into {@link Style} and
 * {@link StyleSet} values. Parsed styles are validated but not registered anywhere.
 *
 * @example
 * ```typescript
 * const parser = new StyleDefinitionParser();
 * const result = parser.loadStylesFromString(`
 *   <StyleSheet xmlns="urn:docstyle:stylesheet" version="1.0">
 *     <Style name="Callout" type="character">
 *       <Character><Font name="Arial" size="18pt"/><Color>#000080</Color></Character>
 *     </Style>
 *   </StyleSheet>`);
 * ```
 */
export class StyleDefinitionParser {
  readonly options: DefinitionParserOptions;

  constructor(options: DefinitionParserOptionsInput = {}) {
    this.options = parseConfig(DefinitionParserOptionsSchema, options, 'StyleDefinitionParser');
  }

  loadStylesFromFile(filePath: string): StyleResult<Style[]> {
    const sheet = this.loadStyleSheetFromFile(filePath);
    return sheet.success ? ok(sheet.value.styles) : sheet;
  }

  loadStylesFromString(xml: string): StyleResult<Style[]> {
    const sheet = this.loadStyleSheetFromString(xml);
    return sheet.success ? ok(sheet.value.styles) : sheet;
  }

  loadStyleSetsFromFile(filePath: string): StyleResult<StyleSet[]> {
    const sheet = this.loadStyleSheetFromFile(filePath);
    return sheet.success ? ok(sheet.value.styleSets) : sheet;
  }

  loadStyleSetsFromString(xml: string): StyleResult<StyleSet[]> {
    const sheet = this.loadStyleSheetFromString(xml);
    return sheet.success ? ok(sheet.value.styleSets) : sheet;
  }

  loadStyleSheetFromFile(filePath: string): StyleResult<StyleSheet> {
    let text: string;
    try {
      text = readFileSync(filePath, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return fail('FILE_NOT_FOUND', `Failed to load XML file '${filePath}': ${reason}`, {
        operation: 'loadStyleSheetFromFile',
        path: filePath,
      });
    }
    const sheet = this.loadStyleSheetFromString(text);
    if (!sheet.success && sheet.error.category === 'XML_PARSING') {
      return wrapFailure(sheet, sheet.error.code, `Invalid style definitions in '${filePath}'`, {
        operation: 'loadStyleSheetFromFile',
        path: filePath,
      });
    }
    return sheet;
  }

  loadStyleSheetFromString(xml: string): StyleResult<StyleSheet> {
    const parsed = parseXml(xml, 'loadStyleSheetFromString');
    if (!parsed.success) return parsed;

    const root = parsed.value;
    const valid = this.validateRoot(root);
    if (!valid.success) return valid;

    const styles: Style[] = [];
    for (const node of childElements(root, 'Style')) {
      const style = this.parseStyle(node);
      if (!style.success) return style;
      styles.push(style.value);
    }

    const styleSets: StyleSet[] = [];
    for (const node of childElements(root, 'StyleSet')) {
      const styleSet = this.parseStyleSet(node);
      if (!styleSet.success) return styleSet;
      styleSets.push(styleSet.value);
    }

    return ok({ styles, styleSets });
  }

  private validateRoot(root: Element): StyleResult {
    if (root.localName !== 'StyleSheet') {
      return fail('XML_INVALID_STRUCTURE', `Root element must be 'StyleSheet', found '${root.nodeName}'`, {
        operation: 'validateRoot',
      });
    }
    if (root.namespaceURI !== STYLESHEET_NAMESPACE) {
      return fail(
        'XML_NAMESPACE_ERROR',
        `Missing or incorrect xmlns attribute. Expected: ${STYLESHEET_NAMESPACE}`,
        { operation: 'validateRoot', value: root.namespaceURI ?? undefined },
      );
    }
    const version = attribute(root, 'version');
    if (version === undefined) {
      return fail('XML_ATTRIBUTE_MISSING', "Missing 'version' attribute in StyleSheet", {
        operation: 'validateRoot',
        field: 'version',
      });
    }
    if (version !== STYLESHEET_VERSION) {
      return fail('UNSUPPORTED_VERSION', `Unsupported schema version: ${version}. Supported: ${STYLESHEET_VERSION}`, {
        operation: 'validateRoot',
        value: version,
      });
    }
    return ok();
  }

  private parseStyle(node: Element): StyleResult<Style> {
    const name = attribute(node, 'name');
    if (!name) {
      return fail('XML_ATTRIBUTE_MISSING', "Style element is missing required attribute 'name'", {
        operation: 'parseStyle',
        field: 'name',
      });
    }
    const rawType = attribute(node, 'type');
    if (!rawType) {
      return fail('XML_ATTRIBUTE_MISSING', `Style '${name}' is missing required attribute 'type'`, {
        operation: 'parseStyle',
        style: name,
        field: 'type',
      });
    }
    const type = rawType.trim().toLowerCase();
    if (!isStyleType(type)) {
      return fail('INVALID_ARGUMENT', `Invalid style type: '${rawType}'`, {
        operation: 'parseStyle',
        style: name,
        field: 'type',
        value: rawType,
      });
    }

    const style = new Style(name, type);
    const context = { operation: 'parseStyle', style: name };

    const base = attribute(node, 'base');
    if (base !== undefined) {
      const linked = style.setBaseStyle(base);
      if (!linked.success) return wrapFailure(linked, 'XML_INVALID_STRUCTURE', `Style '${name}' has an invalid base`, context);
    }

    const paragraphNode = firstChild(node, 'Paragraph');
    if (paragraphNode) {
      const props = this.parseParagraphProperties(paragraphNode);
      const applied = props.success ? style.setParagraphProperties(props.value) : props;
      if (!applied.success) {
        return wrapFailure(applied, 'XML_INVALID_STRUCTURE', `Style '${name}' has an invalid <Paragraph> block`, context);
      }
    }

    const characterNode = firstChild(node, 'Character');
    if (characterNode) {
      const props = this.parseCharacterProperties(characterNode);
      const applied = props.success ? style.setCharacterProperties(props.value) : props;
      if (!applied.success) {
        return wrapFailure(applied, 'XML_INVALID_STRUCTURE', `Style '${name}' has an invalid <Character> block`, context);
      }
    }

    const tableNode = firstChild(node, 'Table');
    if (tableNode) {
      const props = this.parseTableProperties(tableNode);
      const applied = props.success ? style.setTableProperties(props.value) : props;
      if (!applied.success) {
        return wrapFailure(applied, 'XML_INVALID_STRUCTURE', `Style '${name}' has an invalid <Table> block`, context);
      }
    }

    const validation = style.validate();
    if (!validation.success) {
      return wrapFailure(validation, 'VALIDATION_FAILED', `Style '${name}' failed validation`, context);
    }
    return ok(style);
  }

  private parseStyleSet(node: Element): StyleResult<StyleSet> {
    const name = attribute(node, 'name');
    if (!name) {
      return fail('XML_ATTRIBUTE_MISSING', "StyleSet element is missing required attribute 'name'", {
        operation: 'parseStyleSet',
        field: 'name',
      });
    }

    const styleSet = new StyleSet(name, attribute(node, 'description') ?? '');
    for (const include of childElements(node, 'Include')) {
      const styleName = textOf(include);
      if (!styleName) {
        return fail('XML_INVALID_STRUCTURE', `StyleSet '${name}' has an empty <Include>`, {
          operation: 'parseStyleSet',
          styleSet: name,
        });
      }
      styleSet.addStyle(styleName);
    }

    if (styleSet.size === 0) {
      return fail('VALIDATION_FAILED', `StyleSet '${name}' must include at least one style`, {
        operation: 'parseStyleSet',
        styleSet: name,
        field: 'includedStyles',
      });
    }
    return ok(styleSet);
  }

  private parseParagraphProperties(node: Element): StyleResult<ParagraphStyleProperties> {
    const props: ParagraphStyleProperties = {};

    const alignmentNode = firstChild(node, 'Alignment');
    if (alignmentNode) {
      const alignment = lookup(ALIGNMENT_NAMES, textOf(alignmentNode));
      if (!alignment) {
        return fail('INVALID_ALIGNMENT', `Invalid alignment value: '${textOf(alignmentNode)}'`, {
          field: 'Alignment',
          value: textOf(alignmentNode),
        });
      }
      props.alignment = alignment;
    }

    for (const [element, field] of [
      ['SpaceBefore', 'spaceBefore'],
      ['SpaceAfter', 'spaceAfter'],
    ] as const) {
      const spaceNode = firstChild(node, element);
      if (!spaceNode) continue;
      const value = parseValueWithUnit(textOf(spaceNode));
      if (!value.success) return value;
      props[field] = value.value;
    }

    const lineSpacingNode = firstChild(node, 'LineSpacing');
    if (lineSpacingNode) {
      const raw = textOf(lineSpacingNode);
      const value = raw.endsWith('%') ? parsePercentage(raw) : parsePlainNumber(raw, 'LineSpacing');
      if (!value.success) return value;
      props.lineSpacing = value.value;
    }

    const indentationNode = firstChild(node, 'Indentation');
    if (indentationNode) {
      for (const [name, field] of [
        ['left', 'leftIndent'],
        ['right', 'rightIndent'],
        ['firstLine', 'firstLineIndent'],
      ] as const) {
        const raw = attribute(indentationNode, name);
        if (raw === undefined) continue;
        const value = parseValueWithUnit(raw);
        if (!value.success) return value;
        props[field] = value.value;
      }
    }

    const listNode = firstChild(node, 'List');
    if (listNode) {
      const rawType = attribute(listNode, 'type') ?? 'bullet';
      const listType = lookup(LIST_TYPE_NAMES, rawType);
      if (!listType) {
        return fail('INVALID_ARGUMENT', `Invalid list type: '${rawType}'. Supported: none, bullet, number`, {
          field: 'List',
          value: rawType,
        });
      }
      props.listType = listType;
      const rawLevel = attribute(listNode, 'level');
      if (rawLevel !== undefined) {
        const level = parsePlainNumber(rawLevel, 'level');
        if (!level.success) return level;
        props.listLevel = level.value;
      }
    }

    return ok(props);
  }

  private parseCharacterProperties(node: Element): StyleResult<CharacterStyleProperties> {
    const props: CharacterStyleProperties = {};

    const fontNode = firstChild(node, 'Font');
    if (fontNode) {
      const fontName = attribute(fontNode, 'name');
      if (fontName !== undefined) props.fontName = fontName;
      const rawSize = attribute(fontNode, 'size');
      if (rawSize !== undefined) {
        const size = parseValueWithUnit(rawSize);
        if (!size.success) return size;
        props.fontSize = size.value;
      }
    }

    const colorNode = firstChild(node, 'Color');
    if (colorNode) {
      const color = parseColor(textOf(colorNode));
      if (!color.success) return color;
      props.fontColor = color.value;
    }

    const highlightNode = firstChild(node, 'Highlight');
    if (highlightNode && textOf(highlightNode)) {
      const highlight = lookup(HIGHLIGHT_NAMES, textOf(highlightNode));
      if (!highlight) {
        return fail('INVALID_ARGUMENT', `Invalid highlight color: '${textOf(highlightNode)}'`, {
          field: 'Highlight',
          value: textOf(highlightNode),
        });
      }
      props.highlight = highlight;
    }

    const formatNode = firstChild(node, 'Format');
    if (formatNode) {
      let mask: number = FormattingFlags.none;
      for (const flag of FORMAT_ATTRIBUTES) {
        const raw = attribute(formatNode, flag);
        if (raw !== undefined && TRUE_VALUES.includes(raw.trim().toLowerCase())) mask |= FormattingFlags[flag];
      }
      if (mask !== FormattingFlags.none) props.formatting = mask;
    }

    return ok(props);
  }

  private parseTableProperties(node: Element): StyleResult<TableStyleProperties> {
    const props: TableStyleProperties = {};

    const widthNode = firstChild(node, 'Width');
    if (widthNode) {
      const raw = textOf(widthNode);
      if (raw.endsWith('%')) {
        const fraction = parsePercentage(raw);
        if (!fraction.success) return fraction;
        props.width = fraction.value * this.options.tableWidthReference;
      } else {
        const width = parseValueWithUnit(raw);
        if (!width.success) return width;
        props.width = width.value;
      }
    }

    const alignmentNode = firstChild(node, 'Alignment');
    if (alignmentNode) props.alignment = textOf(alignmentNode);

    const bordersNode = firstChild(node, 'Borders');
    if (bordersNode) {
      const borderStyle = attribute(bordersNode, 'style');
      if (borderStyle !== undefined) props.borderStyle = borderStyle;
      const rawWidth = attribute(bordersNode, 'width');
      if (rawWidth !== undefined) {
        const width = parseValueWithUnit(rawWidth);
        if (!width.success) return width;
        props.borderWidth = width.value;
      }
      const rawColor = attribute(bordersNode, 'color');
      if (rawColor !== undefined) {
        const color = parseColor(rawColor);
        if (!color.success) return color;
        props.borderColor = color.value;
      }
    }

    const paddingNode = firstChild(node, 'CellPadding');
    if (paddingNode) {
      const padding = parseValueWithUnit(textOf(paddingNode));
      if (!padding.success) return padding;
      props.cellPadding = padding.value;
    }

    return ok(props);
  }
}

function parsePlainNumber(raw: string, field: string): StyleResult<number> {
  const value = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(value)) {
    return fail('INVALID_ARGUMENT', `Invalid ${field} value: '${raw}'`, { field, value: raw });
  }
  return ok(value);
}
