import {
  BUILT_IN_STYLE_CATEGORIES,
  StyleError,
  createConsoleLogger,
  fail,
  failureFromException,
  ok,
  wrapFailure,
  type BuiltInStyleCategory,
  type CharacterStyleProperties,
  type ParagraphElement,
  type ParagraphStyleProperties,
  type PropertyBags,
  type PropertyKind,
  type RunElement,
  type StyleErrorObserver,
  type StyleLogger,
  type StyleResult,
  type StyleType,
  type StyledDocument,
  type StyledElement,
  type TableElement,
  type TableStyleProperties,
} from '@docstyle/contracts';
import { BUILT_IN_LOAD_ORDER, BUILT_IN_STYLE_LIBRARY } from './built-in-styles.js';
import { CHARACTER_FIELDS, PARAGRAPH_FIELDS, PROPERTY_FIELDS, TABLE_FIELDS, combineProperties, overlay } from './cascade.js';
import {
  StyleManagerConfigSchema,
  parseConfig,
  type DefinitionParserOptionsInput,
  type StyleManagerConfig,
  type StyleManagerConfigInput,
} from './config.js';
import { StyleDefinitionParser } from './definitions/definition-parser.js';
import { generateStylesXml, styleIdFor } from './ooxml/styles-xml.js';
import { Style, markBuiltIn } from './style.js';
import { StyleSet } from './style-set.js';
import { validateCharacterProperties, validateParagraphProperties, validateTableProperties } from './validation.js';

export interface StyleManagerOptions {
  config?: StyleManagerConfigInput;
  /** Defaults to a console logger tagged `[StyleManager]` at the configured level. */
  logger?: StyleLogger;
  /** Receives every failure returned by a public operation. */
  observer?: StyleErrorObserver;
}

/** Outcome of {@link StyleManager.applyStyleSet}. */
export interface StyleSetApplication {
  styleSet: string;
  tablesStyled: number;
  paragraphsStyled: number;
  runsStyled: number;
  /** Included styles that have no cascade phase (numbering). */
  skippedStyles: string[];
  failures: StyleError[];
}

/** Outcome of {@link StyleManager.applyStyleMappings}. */
export interface StyleMappingApplication {
  /** Elements styled, per mapping pattern. */
  applied: Record<string, number>;
  failures: StyleError[];
}

export interface StyleSheetImport {
  styles: number;
  styleSets: number;
}

const BAG_READERS: { [K in PropertyKind]: (style: Style) => PropertyBags[K] } = {
  paragraph: (style) => style.paragraphProperties,
  character: (style) => style.characterProperties,
  table: (style) => style.tableProperties,
};

const CREATE_OPERATION: Record<Exclude<StyleType, 'numbering'>, string> = {
  paragraph: 'createParagraphStyle',
  character: 'createCharacterStyle',
  table: 'createTableStyle',
  mixed: 'createMixedStyle',
};

/** Lowercase, without spaces: `Heading 1` → `heading1`. */
const normalizeStyleName = (name: string) => name.replace(/\s+/g, '').toLowerCase();
const HEADING_PATTERN = /^(?:heading|h)([1-9])$/;
const ANY_HEADING = /^heading\d+$/;

/**
 * Registry and engine for named styles.
 *
 * Owns every registered {@link Style} and {@link StyleSet}. References returned by lookups
 * stay valid until the entry is removed or the registry is cleared; after that the
 * manager no longer tracks them.
 *
 * Every public operation returns a {@link StyleResult}. Failures are also passed to the
 * configured {@link StyleErrorObserver}.
 *
 * @example
 * ```typescript
 * const manager = new StyleManager();
 * manager.loadAllBuiltInStyles();
 * const quote = manager.createParagraphStyle('Quote');
 * if (quote.success) {
 *   quote.value.setBaseStyle('Normal');
 *   quote.value.setAlignment('center');
 * }
 * manager.applyParagraphStyle(paragraph, 'Quote');
 * ```
 */
export class StyleManager {
  readonly config: StyleManagerConfig;

  #styles = new Map<string, Style>();
  #styleSets = new Map<string, StyleSet>();
  #loadedCategories = new Set<BuiltInStyleCategory>();
  #logger: StyleLogger;
  #observer: StyleErrorObserver | undefined;

  constructor(options: StyleManagerOptions = {}) {
    this.config = parseConfig(StyleManagerConfigSchema, options.config, 'StyleManager');
    this.#logger = options.logger ?? createConsoleLogger('StyleManager', this.config.logLevel);
    this.#observer = options.observer;
  }

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  createParagraphStyle(name: string): StyleResult<Style> {
    return this.#report(this.#createStyle(name, 'paragraph'));
  }

  createCharacterStyle(name: string): StyleResult<Style> {
    return this.#report(this.#createStyle(name, 'character'));
  }

  createTableStyle(name: string): StyleResult<Style> {
    return this.#report(this.#createStyle(name, 'table'));
  }

  createMixedStyle(name: string): StyleResult<Style> {
    return this.#report(this.#createStyle(name, 'mixed'));
  }

  /**
   * Adopts a style built outside the manager, such as one returned by the definition
   * parser. Its base style must already be registered.
   */
  registerStyle(style: Style): StyleResult<Style> {
    const registered = this.#registerStyles([style]);
    return this.#report(registered.success ? ok(style) : registered);
  }

  /**
   * Adopts several styles at once. Bases may refer to registered styles or to other
   * styles in the batch. Nothing is registered unless every style is accepted.
   */
  registerStyles(styles: readonly Style[]): StyleResult<number> {
    return this.#report(this.#registerStyles(styles));
  }

  getStyle(name: string): StyleResult<Style> {
    return this.#report(this.#lookupStyle(name, 'getStyle'));
  }

  hasStyle(name: string): boolean {
    return this.#styles.has(name);
  }

  /**
   * Removes a style. Fails while another style names it as its base. Style-set membership
   * does not block removal.
   */
  removeStyle(name: string): StyleResult {
    const found = this.#lookupStyle(name, 'removeStyle');
    if (!found.success) return this.#report(found);

    const dependents = [...this.#styles.values()].filter((style) => style.baseStyle === name).map((style) => style.name);
    if (dependents.length > 0) {
      return this.#report(
        fail('STYLE_DEPENDENCY_MISSING', `Cannot remove style '${name}': it is the base of ${dependents.join(', ')}`, {
          operation: 'removeStyle',
          style: name,
          dependents,
        }),
      );
    }

    this.#styles.delete(name);
    this.#logger.debug(`Removed style '${name}'`);
    return ok();
  }

  styleCount(): number {
    return this.#styles.size;
  }

  /** Style names in registration order. */
  getAllStyleNames(): string[] {
    return [...this.#styles.keys()];
  }

  getStyleNamesByType(type: StyleType): string[] {
    return [...this.#styles.values()].filter((style) => style.type === type).map((style) => style.name);
  }

  /** Drops every style and style set and forgets which built-in categories were loaded. */
  clearAllStyles(): void {
    this.#styles.clear();
    this.#styleSets.clear();
    this.#loadedCategories.clear();
  }

  /** Validates every registered style and every inheritance chain. */
  validateAllStyles(): StyleResult {
    for (const style of this.#styles.values()) {
      const valid = style.validate();
      if (!valid.success) {
        return this.#report(
          wrapFailure(valid, 'VALIDATION_FAILED', `Style '${style.name}' failed validation`, {
            operation: 'validateAllStyles',
            style: style.name,
          }),
        );
      }
      const chain = this.#checkInheritanceChain(style.name, 'validateAllStyles');
      if (!chain.success) return this.#report(chain);
    }
    return ok();
  }

  // ---------------------------------------------------------------------------
  // Built-in styles
  // ---------------------------------------------------------------------------

  /**
   * Registers the built-in styles of a category. Loading a category again is a no-op.
   * Built-in names that are already taken are left alone.
   *
   * @returns The number of styles added.
   */
  loadBuiltInStyles(category: BuiltInStyleCategory): StyleResult<number> {
    return this.#report(this.#loadBuiltInStyles(category));
  }

  loadAllBuiltInStyles(): StyleResult<number> {
    let added = 0;
    for (const category of BUILT_IN_LOAD_ORDER) {
      const loaded = this.#loadBuiltInStyles(category);
      if (!loaded.success) {
        return this.#report(
          wrapFailure(loaded, 'STYLE_PROPERTY_INVALID', `Failed to load built-in '${category}' styles`, {
            operation: 'loadAllBuiltInStyles',
            category,
          }),
        );
      }
      added += loaded.value;
    }
    return ok(added);
  }

  /** Names the built-in library defines, for one category or all of them. */
  getBuiltInStyleNames(category?: BuiltInStyleCategory): string[] {
    const categories = category ? [category] : BUILT_IN_LOAD_ORDER;
    return categories.flatMap((entry) => BUILT_IN_STYLE_LIBRARY[entry].map((definition) => definition.name));
  }

  isBuiltInCategoryLoaded(category: BuiltInStyleCategory): boolean {
    return this.#loadedCategories.has(category);
  }

  // ---------------------------------------------------------------------------
  // Inheritance
  // ---------------------------------------------------------------------------

  /**
   * Resolves paragraph properties through a style and its bases. An unknown style
   * returns `start` unchanged.
   */
  resolveParagraphInheritance(
    start: ParagraphStyleProperties,
    styleName: string,
  ): StyleResult<ParagraphStyleProperties> {
    return this.#report(this.#resolve('paragraph', start, styleName, new Set()));
  }

  resolveCharacterInheritance(
    start: CharacterStyleProperties,
    styleName: string,
  ): StyleResult<CharacterStyleProperties> {
    return this.#report(this.#resolve('character', start, styleName, new Set()));
  }

  resolveTableInheritance(start: TableStyleProperties, styleName: string): StyleResult<TableStyleProperties> {
    return this.#report(this.#resolve('table', start, styleName, new Set()));
  }

  /** Direct formatting merged with the attached style chain; the style wins on conflicts. */
  getEffectiveParagraphProperties(paragraph: ParagraphElement): StyleResult<ParagraphStyleProperties> {
    return this.#report(this.#effective('paragraph', paragraph, this.#readParagraph(paragraph)));
  }

  getEffectiveCharacterProperties(run: RunElement): StyleResult<CharacterStyleProperties> {
    return this.#report(this.#effective('character', run, this.#readCharacter(run)));
  }

  getEffectiveTableProperties(table: TableElement): StyleResult<TableStyleProperties> {
    return this.#report(this.#effective('table', table, this.#readTable(table)));
  }

  // ---------------------------------------------------------------------------
  // Property application
  // ---------------------------------------------------------------------------

  applyParagraphProperties(paragraph: ParagraphElement, props: ParagraphStyleProperties): StyleResult {
    return this.#report(this.#applyParagraphProperties(paragraph, props));
  }

  applyCharacterProperties(run: RunElement, props: CharacterStyleProperties): StyleResult {
    return this.#report(this.#applyCharacterProperties(run, props));
  }

  applyTableProperties(table: TableElement, props: TableStyleProperties): StyleResult {
    return this.#report(this.#applyTableProperties(table, props));
  }

  // ---------------------------------------------------------------------------
  // Style application
  // ---------------------------------------------------------------------------

  /** Attaches a paragraph or mixed style and writes its paragraph properties. */
  applyParagraphStyle(paragraph: ParagraphElement, styleName: string): StyleResult {
    return this.#report(this.#applyStyle(paragraph, styleName));
  }

  /** Attaches a character or mixed style and writes its character properties. */
  applyCharacterStyle(run: RunElement, styleName: string): StyleResult {
    return this.#report(this.#applyStyle(run, styleName));
  }

  applyTableStyle(table: TableElement, styleName: string): StyleResult {
    return this.#report(this.#applyStyle(table, styleName));
  }

  /** Applies a style to any styled element, dispatching on its `kind`. */
  applyStyle(element: StyledElement, styleName: string): StyleResult {
    return this.#report(this.#applyStyle(element, styleName));
  }

  // ---------------------------------------------------------------------------
  // Extraction and comparison
  // ---------------------------------------------------------------------------

  /** Direct paragraph formatting, without inheritance. */
  readParagraphProperties(paragraph: ParagraphElement): StyleResult<ParagraphStyleProperties> {
    return this.#report(this.#readParagraph(paragraph));
  }

  readCharacterProperties(run: RunElement): StyleResult<CharacterStyleProperties> {
    return this.#report(this.#readCharacter(run));
  }

  readTableProperties(table: TableElement): StyleResult<TableStyleProperties> {
    return this.#report(this.#readTable(table));
  }

  /**
   * Registers a new style built from an element's direct formatting: paragraphs give
   * paragraph styles, runs character styles, tables table styles.
   */
  extractStyleFromElement(element: StyledElement, newStyleName: string): StyleResult<Style> {
    return this.#report(this.#extractStyle(element, newStyleName));
  }

  /** Human-readable, line-per-difference report. */
  compareStyles(firstName: string, secondName: string): StyleResult<string> {
    const first = this.#lookupStyle(firstName, 'compareStyles');
    if (!first.success) return this.#report(first);
    const second = this.#lookupStyle(secondName, 'compareStyles');
    if (!second.success) return this.#report(second);

    const a = first.value;
    const b = second.value;
    const show = (value: unknown) => (value === undefined ? 'unset' : String(value));
    const lines: string[] = [];
    const compare = (label: string, left: unknown, right: unknown) => {
      if (left !== right) lines.push(`- ${label} differs: ${show(left)} vs ${show(right)}`);
    };

    compare('Type', a.type, b.type);
    const pa = a.paragraphProperties;
    const pb = b.paragraphProperties;
    compare('Alignment', pa.alignment, pb.alignment);
    compare('Space before', pa.spaceBefore, pb.spaceBefore);
    compare('Space after', pa.spaceAfter, pb.spaceAfter);
    compare('Line spacing', pa.lineSpacing, pb.lineSpacing);
    const ca = a.characterProperties;
    const cb = b.characterProperties;
    compare('Font', ca.fontName, cb.fontName);
    compare('Font size', ca.fontSize, cb.fontSize);
    compare('Color', ca.fontColor, cb.fontColor);

    if (lines.length === 0) return ok(`Styles '${a.name}' and '${b.name}' are identical`);
    return ok([`Comparing '${a.name}' with '${b.name}':`, ...lines].join('\n'));
  }

  // ---------------------------------------------------------------------------
  // Style sets
  // ---------------------------------------------------------------------------

  /** Registers a style set. Every included style must already be registered. */
  registerStyleSet(styleSet: StyleSet): StyleResult {
    return this.#report(this.#registerStyleSet(styleSet));
  }

  /** A copy of the registered set; changing it does not change the registry. */
  getStyleSet(name: string): StyleResult<StyleSet> {
    const styleSet = this.#styleSets.get(name);
    if (!styleSet) {
      return this.#report(fail('STYLE_NOT_FOUND', `Style set '${name}' not found`, { operation: 'getStyleSet', styleSet: name }));
    }
    return ok(copyStyleSet(styleSet));
  }

  hasStyleSet(name: string): boolean {
    return this.#styleSets.has(name);
  }

  removeStyleSet(name: string): StyleResult {
    if (!this.#styleSets.delete(name)) {
      return this.#report(
        fail('STYLE_NOT_FOUND', `Style set '${name}' not found`, { operation: 'removeStyleSet', styleSet: name }),
      );
    }
    return ok();
  }

  /** Style set names in registration order. */
  listStyleSets(): string[] {
    return [...this.#styleSets.keys()];
  }

  /**
   * Applies a style set to a whole document in three phases:
   *
   * 1. table styles, to every table;
   * 2. paragraph and mixed styles, to paragraphs without a style reference;
   * 3. character styles, to runs without a style reference.
   *
   * Every included style must still be registered, or nothing is applied. Failures on
   * individual elements do not stop the remaining work and are not rolled back; when any
   * occur the call fails with the first one as its cause.
   */
  applyStyleSet(name: string, document: StyledDocument): StyleResult<StyleSetApplication> {
    const operation = 'applyStyleSet';
    const styleSet = this.#styleSets.get(name);
    if (!styleSet) {
      return this.#report(fail('STYLE_NOT_FOUND', `Style set '${name}' not found`, { operation, styleSet: name }));
    }

    const styles: Style[] = [];
    for (const styleName of styleSet.includedStyles) {
      const found = this.#lookupStyle(styleName, operation);
      if (!found.success) {
        return this.#report(
          wrapFailure(found, 'STYLE_DEPENDENCY_MISSING', `Style set '${name}' includes missing style '${styleName}'`, {
            operation,
            styleSet: name,
            style: styleName,
          }),
        );
      }
      styles.push(found.value);
    }

    const report: StyleSetApplication = {
      styleSet: name,
      tablesStyled: 0,
      paragraphsStyled: 0,
      runsStyled: 0,
      skippedStyles: [],
      failures: [],
    };
    const record = (result: StyleResult): boolean => {
      if (result.success) return true;
      report.failures.push(result.error);
      this.#logger.warn(`Style set '${name}': ${result.error.message}`);
      return false;
    };

    for (const style of styles.filter((entry) => entry.type === 'numbering')) {
      report.skippedStyles.push(style.name);
      this.#logger.warn(`Style set '${name}': skipping numbering style '${style.name}'`);
    }

    const targets = this.#collect(document, operation);
    if (!targets.success) return this.#report(targets);
    const { tables, paragraphs, runs } = targets.value;

    for (const style of styles.filter((entry) => entry.type === 'table')) {
      for (const table of tables) {
        if (record(this.#applyStyle(table, style.name))) report.tablesStyled += 1;
      }
    }

    for (const style of styles.filter((entry) => entry.type === 'paragraph' || entry.type === 'mixed')) {
      for (const paragraph of paragraphs) {
        const current = this.#attached(paragraph);
        if (!current.success) {
          record(current);
          continue;
        }
        if (current.value !== undefined) continue;
        if (record(this.#applyStyle(paragraph, style.name))) report.paragraphsStyled += 1;
      }
    }

    for (const style of styles.filter((entry) => entry.type === 'character')) {
      for (const run of runs) {
        const current = this.#attached(run);
        if (!current.success) {
          record(current);
          continue;
        }
        if (current.value !== undefined) continue;
        if (record(this.#applyStyle(run, style.name))) report.runsStyled += 1;
      }
    }

    if (report.failures.length > 0) {
      return this.#report(
        fail(
          new StyleError(
            'ELEMENT_OPERATION_FAILED',
            `Style set '${name}' failed on ${report.failures.length} element(s)`,
            { operation, styleSet: name, report },
            report.failures[0],
          ),
        ),
      );
    }
    this.#logger.info(
      `Applied style set '${name}': ${report.tablesStyled} tables, ${report.paragraphsStyled} paragraphs, ${report.runsStyled} runs`,
    );
    return ok(report);
  }

  /**
   * Applies styles by pattern. Patterns: `heading1`/`h1` … `heading9`/`h9`, `heading*`/`h*`,
   * `table`/`tables`, `normal`/`body` (Normal or unstyled paragraphs), `code`, or an exact
   * style name already attached to content. Every target style must exist, or nothing is
   * applied. Matches are computed before any style is applied.
   */
  applyStyleMappings(
    document: StyledDocument,
    mapping: Readonly<Record<string, string>>,
  ): StyleResult<StyleMappingApplication> {
    const operation = 'applyStyleMappings';
    const entries = Object.entries(mapping);

    for (const [pattern, styleName] of entries) {
      const found = this.#lookupStyle(styleName, operation);
      if (!found.success) {
        return this.#report(
          wrapFailure(found, 'STYLE_NOT_FOUND', `Mapping '${pattern}' targets unknown style '${styleName}'`, {
            operation,
            style: styleName,
            pattern,
          }),
        );
      }
    }

    const targets = this.#collect(document, operation);
    if (!targets.success) return this.#report(targets);

    const snapshot = this.#snapshotStyleNames(targets.value);
    if (!snapshot.success) return this.#report(snapshot);

    const plan = entries.map(([pattern, styleName]) => ({
      pattern,
      styleName,
      elements: matchPattern(pattern, snapshot.value),
    }));

    const report: StyleMappingApplication = { applied: {}, failures: [] };
    for (const { pattern, styleName, elements } of plan) {
      report.applied[pattern] = 0;
      for (const element of elements) {
        const applied = this.#applyStyle(element, styleName);
        if (applied.success) {
          report.applied[pattern] += 1;
        } else {
          report.failures.push(applied.error);
          this.#logger.warn(`Mapping '${pattern}': ${applied.error.message}`);
        }
      }
    }

    if (report.failures.length > 0) {
      return this.#report(
        fail(
          new StyleError(
            'ELEMENT_OPERATION_FAILED',
            `Style mappings failed on ${report.failures.length} element(s)`,
            { operation, report },
            report.failures[0],
          ),
        ),
      );
    }
    return ok(report);
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /** `word/styles.xml` for every registered style, in registration order. */
  generateStylesXml(): string {
    return generateStylesXml(this.#styles.values());
  }

  /** Parses a `<StyleSheet>` document and registers its styles, then its style sets. */
  importStyleSheet(xml: string, parserOptions?: DefinitionParserOptionsInput): StyleResult<StyleSheetImport> {
    const operation = 'importStyleSheet';
    const sheet = new StyleDefinitionParser(parserOptions).loadStyleSheetFromString(xml);
    if (!sheet.success) {
      return this.#report(wrapFailure(sheet, sheet.error.code, 'Failed to parse style sheet', { operation }));
    }

    const registered = this.#registerStyles(sheet.value.styles);
    if (!registered.success) {
      return this.#report(wrapFailure(registered, registered.error.code, 'Failed to register style sheet styles', { operation }));
    }

    let styleSets = 0;
    for (const styleSet of sheet.value.styleSets) {
      const added = this.#registerStyleSet(styleSet);
      if (!added.success) {
        return this.#report(
          wrapFailure(added, added.error.code, `Failed to register style set '${styleSet.name}'`, {
            operation,
            styleSet: styleSet.name,
          }),
        );
      }
      styleSets += 1;
    }
    return ok({ styles: registered.value, styleSets });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  #report<T>(result: StyleResult<T>): StyleResult<T> {
    if (!result.success) this.#observer?.onError(result.error);
    return result;
  }

  #validateName(name: string, operation: string): StyleResult {
    if (!name.trim()) {
      return fail('VALIDATION_FAILED', 'Style name cannot be empty', { operation, field: 'name', value: name });
    }
    if (name.length > this.config.maxStyleNameLength) {
      return fail(
        'VALIDATION_FAILED',
        `Style name exceeds ${this.config.maxStyleNameLength} characters`,
        { operation, field: 'name', value: name.length },
      );
    }
    if (this.#styles.has(name)) {
      return fail('STYLE_ALREADY_EXISTS', `Style '${name}' already exists`, { operation, style: name });
    }
    const clash = this.#nameForStyleId(styleIdFor(name));
    if (clash !== undefined) {
      return fail('STYLE_ALREADY_EXISTS', `Style '${name}' has the same style id as '${clash}'`, {
        operation,
        style: name,
        value: styleIdFor(name),
      });
    }
    return ok();
  }

  /** Registered name whose style id is `id`. */
  #nameForStyleId(id: string): string | undefined {
    for (const name of this.#styles.keys()) {
      if (styleIdFor(name) === id) return name;
    }
    return undefined;
  }

  #createStyle(name: string, type: Exclude<StyleType, 'numbering'>): StyleResult<Style> {
    const valid = this.#validateName(name, CREATE_OPERATION[type]);
    if (!valid.success) return valid;
    const style = new Style(name, type);
    this.#styles.set(name, style);
    this.#logger.debug(`Created ${type} style '${name}'`);
    return ok(style);
  }

  #registerStyles(styles: readonly Style[]): StyleResult<number> {
    const operation = 'registerStyles';
    const batch = new Set<string>();
    const batchIds = new Set<string>();
    for (const style of styles) {
      const valid = this.#validateName(style.name, operation);
      if (!valid.success) return valid;
      if (batch.has(style.name) || batchIds.has(styleIdFor(style.name))) {
        return fail('STYLE_ALREADY_EXISTS', `Style '${style.name}' appears more than once`, {
          operation,
          style: style.name,
          value: styleIdFor(style.name),
        });
      }
      batch.add(style.name);
      batchIds.add(styleIdFor(style.name));

      const checked = style.validate();
      if (!checked.success) {
        return wrapFailure(checked, 'VALIDATION_FAILED', `Style '${style.name}' failed validation`, {
          operation,
          style: style.name,
        });
      }
    }

    for (const style of styles) {
      const base = style.baseStyle;
      if (base !== undefined && !this.#styles.has(base) && !batch.has(base)) {
        return fail(
          new StyleError(
            'STYLE_DEPENDENCY_MISSING',
            `Style '${style.name}' is based on unknown style '${base}'`,
            { operation, style: style.name, value: base },
            new StyleError('STYLE_NOT_FOUND', `Style '${base}' not found`, { operation, style: base }),
          ),
        );
      }
    }

    for (const style of styles) this.#styles.set(style.name, style);
    this.#logger.debug(`Registered ${styles.length} style(s)`);
    return ok(styles.length);
  }

  #lookupStyle(name: string, operation: string): StyleResult<Style> {
    const style = this.#styles.get(name);
    if (!style) return fail('STYLE_NOT_FOUND', `Style '${name}' not found`, { operation, style: name });
    return ok(style);
  }

  #registerStyleSet(styleSet: StyleSet): StyleResult {
    const operation = 'registerStyleSet';
    if (this.#styleSets.has(styleSet.name)) {
      return fail('STYLE_ALREADY_EXISTS', `Style set '${styleSet.name}' already exists`, {
        operation,
        styleSet: styleSet.name,
      });
    }
    if (styleSet.size === 0) {
      return fail('VALIDATION_FAILED', `Style set '${styleSet.name}' must include at least one style`, {
        operation,
        styleSet: styleSet.name,
        field: 'includedStyles',
      });
    }
    for (const styleName of styleSet.includedStyles) {
      const found = this.#lookupStyle(styleName, operation);
      if (!found.success) {
        return wrapFailure(found, 'STYLE_DEPENDENCY_MISSING', `Style set '${styleSet.name}' includes unknown style '${styleName}'`, {
          operation,
          styleSet: styleSet.name,
          style: styleName,
        });
      }
    }

    this.#styleSets.set(styleSet.name, copyStyleSet(styleSet));
    this.#logger.debug(`Registered style set '${styleSet.name}' (${styleSet.size} styles)`);
    return ok();
  }

  #loadBuiltInStyles(category: BuiltInStyleCategory): StyleResult<number> {
    const operation = 'loadBuiltInStyles';
    if (!BUILT_IN_STYLE_CATEGORIES.includes(category)) {
      return fail('INVALID_ARGUMENT', `Unknown built-in style category '${category}'`, { operation, value: category });
    }
    if (this.#loadedCategories.has(category)) {
      this.#logger.debug(`Built-in '${category}' styles already loaded`);
      return ok(0);
    }

    const created: Style[] = [];
    for (const definition of BUILT_IN_STYLE_LIBRARY[category]) {
      if (this.#styles.has(definition.name) || this.#nameForStyleId(styleIdFor(definition.name)) !== undefined) {
        this.#logger.warn(`Built-in style '${definition.name}' skipped: name already registered`);
        continue;
      }
      const style = new Style(definition.name, definition.type);
      const steps = [
        definition.paragraph ? style.setParagraphProperties(definition.paragraph) : ok(),
        definition.character ? style.setCharacterProperties(definition.character) : ok(),
      ];
      for (const step of steps) {
        if (!step.success) {
          return wrapFailure(step, 'STYLE_PROPERTY_INVALID', `Built-in style '${definition.name}' is invalid`, {
            operation,
            style: definition.name,
          });
        }
      }
      markBuiltIn(style);
      created.push(style);
    }

    for (const style of created) this.#styles.set(style.name, style);
    this.#loadedCategories.add(category);
    this.#logger.debug(`Loaded ${created.length} built-in '${category}' style(s)`);
    return ok(created.length);
  }

  #resolve<K extends PropertyKind>(
    kind: K,
    start: PropertyBags[K],
    styleName: string,
    visited: ReadonlySet<string>,
  ): StyleResult<PropertyBags[K]> {
    const style = this.#styles.get(styleName);
    if (!style) return ok(start);
    if (visited.has(styleName)) {
      return fail(
        'STYLE_INHERITANCE_CYCLE',
        `Inheritance cycle: ${[...visited, styleName].join(' -> ')}`,
        { operation: 'resolveInheritance', style: styleName },
      );
    }

    const fields = PROPERTY_FIELDS[kind];
    const own = BAG_READERS[kind](style);
    if (!style.baseStyle) return ok(overlay(start, own, fields));

    const inherited = this.#resolve(kind, start, style.baseStyle, new Set([...visited, styleName]));
    if (!inherited.success) return inherited;
    return ok(overlay(inherited.value, own, fields));
  }

  #checkInheritanceChain(styleName: string, operation: string): StyleResult {
    const seen: string[] = [];
    let current: string | undefined = styleName;
    while (current !== undefined) {
      if (seen.includes(current)) {
        return fail('STYLE_INHERITANCE_CYCLE', `Inheritance cycle: ${[...seen, current].join(' -> ')}`, {
          operation,
          style: styleName,
        });
      }
      seen.push(current);
      const style = this.#styles.get(current);
      if (!style) {
        if (current === styleName) break;
        return fail(
          new StyleError(
            'STYLE_DEPENDENCY_MISSING',
            `Style '${seen[seen.length - 2]}' is based on unknown style '${current}'`,
            { operation, style: styleName, value: current },
            new StyleError('STYLE_NOT_FOUND', `Style '${current}' not found`, { operation, style: current }),
          ),
        );
      }
      current = style.baseStyle;
    }
    return ok();
  }

  #effective<K extends PropertyKind>(
    kind: K,
    element: StyledElement,
    direct: StyleResult<PropertyBags[K]>,
  ): StyleResult<PropertyBags[K]> {
    if (!direct.success) return direct;
    const attached = this.#attached(element);
    if (!attached.success) return attached;
    if (attached.value === undefined) return direct;
    return this.#resolve(kind, direct.value, attached.value, new Set());
  }

  /** Name of the style an element refers to; content refers to styles by style id. */
  #attached(element: StyledElement): StyleResult<string | undefined> {
    try {
      const reference = element.getStyleName();
      if (reference === undefined || this.#styles.has(reference)) return ok(reference);
      return ok(this.#nameForStyleId(reference) ?? reference);
    } catch (error) {
      return failureFromException(error, 'getStyleName');
    }
  }

  #readParagraph(paragraph: ParagraphElement): StyleResult<ParagraphStyleProperties> {
    try {
      const spacing = paragraph.getSpacing();
      const indentation = paragraph.getIndentation();
      const list = paragraph.getListStyle();
      return ok(
        combineProperties<ParagraphStyleProperties>(
          [
            {
              alignment: paragraph.getAlignment(),
              spaceBefore: spacing.before,
              spaceAfter: spacing.after,
              lineSpacing: paragraph.getLineSpacing(),
              leftIndent: indentation.left,
              rightIndent: indentation.right,
              firstLineIndent: paragraph.getFirstLineIndent(),
              listType: list?.type,
              listLevel: list?.level,
            },
          ],
          PARAGRAPH_FIELDS,
        ),
      );
    } catch (error) {
      return failureFromException(error, 'readParagraphProperties');
    }
  }

  #readCharacter(run: RunElement): StyleResult<CharacterStyleProperties> {
    try {
      const formatting = run.getFormatting();
      return ok(
        combineProperties<CharacterStyleProperties>(
          [
            {
              fontName: run.getFontName(),
              fontSize: run.getFontSize(),
              fontColor: run.getColor(),
              highlight: run.getHighlight(),
              formatting: formatting === 0 ? undefined : formatting,
            },
          ],
          CHARACTER_FIELDS,
        ),
      );
    } catch (error) {
      return failureFromException(error, 'readCharacterProperties');
    }
  }

  #readTable(table: TableElement): StyleResult<TableStyleProperties> {
    try {
      const margins = table.getCellMargins();
      const uniform =
        margins &&
        margins.top === margins.right &&
        margins.top === margins.bottom &&
        margins.top === margins.left
          ? margins.top
          : undefined;
      return ok(
        combineProperties<TableStyleProperties>(
          [
            {
              borderStyle: table.getBorderStyle(),
              borderWidth: table.getBorderWidth(),
              borderColor: table.getBorderColor(),
              cellPadding: uniform,
              width: table.getWidth(),
              alignment: table.getAlignment(),
            },
          ],
          TABLE_FIELDS,
        ),
      );
    } catch (error) {
      return failureFromException(error, 'readTableProperties');
    }
  }

  #applyParagraphProperties(paragraph: ParagraphElement, props: ParagraphStyleProperties): StyleResult {
    const validated = validateParagraphProperties(props);
    if (!validated.success) return validated;
    const p = validated.value;

    try {
      if (p.alignment !== undefined) paragraph.setAlignment(p.alignment);
      if (p.spaceBefore !== undefined || p.spaceAfter !== undefined) paragraph.setSpacing(p.spaceBefore, p.spaceAfter);
      if (p.lineSpacing !== undefined) paragraph.setLineSpacing(p.lineSpacing);
      if (p.leftIndent !== undefined || p.rightIndent !== undefined) paragraph.setIndentation(p.leftIndent, p.rightIndent);
      if (p.firstLineIndent !== undefined) paragraph.setFirstLineIndent(p.firstLineIndent);
      if (p.listType !== undefined) {
        paragraph.setListStyle(p.listType, p.listLevel ?? 0);
      } else if (p.listLevel !== undefined) {
        const current = paragraph.getListStyle();
        if (current && current.type !== 'none') paragraph.setListStyle(current.type, p.listLevel);
      }
      return ok();
    } catch (error) {
      return failureFromException(error, 'applyParagraphProperties');
    }
  }

  #applyCharacterProperties(run: RunElement, props: CharacterStyleProperties): StyleResult {
    const validated = validateCharacterProperties(props);
    if (!validated.success) return validated;
    const c = validated.value;

    try {
      if (c.fontName !== undefined) run.setFontName(c.fontName);
      if (c.fontSize !== undefined) run.setFontSize(c.fontSize);
      if (c.fontColor !== undefined) run.setColor(c.fontColor);
      if (c.highlight !== undefined) run.setHighlight(c.highlight);
      return ok();
    } catch (error) {
      return failureFromException(error, 'applyCharacterProperties');
    }
  }

  #applyTableProperties(table: TableElement, props: TableStyleProperties): StyleResult {
    const validated = validateTableProperties(props);
    if (!validated.success) return validated;
    const t = validated.value;

    try {
      if (t.width !== undefined) table.setWidth(t.width);
      if (t.alignment !== undefined) table.setAlignment(t.alignment);
      if (t.borderStyle !== undefined) table.setBorderStyle(t.borderStyle);
      if (t.borderWidth !== undefined) table.setBorderWidth(t.borderWidth);
      if (t.borderColor !== undefined) table.setBorderColor(t.borderColor);
      if (t.cellPadding !== undefined) {
        table.setCellMargins(t.cellPadding, t.cellPadding, t.cellPadding, t.cellPadding);
      }
      return ok();
    } catch (error) {
      return failureFromException(error, 'applyTableProperties');
    }
  }

  #applyStyle(element: StyledElement, styleName: string): StyleResult {
    const operation = { paragraph: 'applyParagraphStyle', run: 'applyCharacterStyle', table: 'applyTableStyle' }[
      element.kind
    ];
    const found = this.#lookupStyle(styleName, operation);
    if (!found.success) return found;
    const style = found.value;

    const bagKind: PropertyKind = element.kind === 'run' ? 'character' : element.kind;
    if (!style.accepts(bagKind)) {
      return fail(
        'STYLE_PROPERTY_INVALID',
        `${style.type} style '${styleName}' cannot be applied to a ${element.kind}`,
        { operation, style: styleName, field: element.kind },
      );
    }

    try {
      element.setStyleName(styleIdFor(styleName));
    } catch (error) {
      return failureFromException(error, operation);
    }

    switch (element.kind) {
      case 'paragraph':
        return this.#applyParagraphProperties(element, style.paragraphProperties);
      case 'run':
        return this.#applyCharacterProperties(element, style.characterProperties);
      case 'table':
        return this.#applyTableProperties(element, style.tableProperties);
    }
  }

  #extractStyle(element: StyledElement, newStyleName: string): StyleResult<Style> {
    const operation = 'extractStyleFromElement';
    const valid = this.#validateName(newStyleName, operation);
    if (!valid.success) return valid;

    let style: Style;
    let populated: StyleResult;
    switch (element.kind) {
      case 'paragraph': {
        const props = this.#readParagraph(element);
        if (!props.success) return props;
        style = new Style(newStyleName, 'paragraph');
        populated = style.setParagraphProperties(props.value);
        break;
      }
      case 'run': {
        const props = this.#readCharacter(element);
        if (!props.success) return props;
        style = new Style(newStyleName, 'character');
        populated = style.setCharacterProperties(props.value);
        break;
      }
      case 'table': {
        const props = this.#readTable(element);
        if (!props.success) return props;
        style = new Style(newStyleName, 'table');
        populated = style.setTableProperties(props.value);
        break;
      }
    }
    if (!populated.success) {
      return wrapFailure(populated, 'STYLE_PROPERTY_INVALID', `Cannot extract style '${newStyleName}'`, {
        operation,
        style: newStyleName,
      });
    }

    this.#styles.set(newStyleName, style);
    this.#logger.debug(`Extracted ${style.type} style '${newStyleName}'`);
    return ok(style);
  }

  #collect(
    document: StyledDocument,
    operation: string,
  ): StyleResult<{ tables: TableElement[]; paragraphs: ParagraphElement[]; runs: RunElement[] }> {
    try {
      return ok({ tables: document.tables(), paragraphs: document.paragraphs(), runs: document.runs() });
    } catch (error) {
      return failureFromException(error, operation);
    }
  }

  #snapshotStyleNames(targets: {
    tables: TableElement[];
    paragraphs: ParagraphElement[];
    runs: RunElement[];
  }): StyleResult<StyledSnapshot> {
    const snapshot: StyledSnapshot = { paragraphs: [], runs: [], tables: [] };
    const groups = [
      [targets.paragraphs, snapshot.paragraphs],
      [targets.runs, snapshot.runs],
      [targets.tables, snapshot.tables],
    ] as const;
    for (const [elements, into] of groups) {
      for (const element of elements) {
        const current = this.#attached(element);
        if (!current.success) return current;
        into.push({ element, styleName: current.value });
      }
    }
    return ok(snapshot);
  }
}

const copyStyleSet = (styleSet: StyleSet) =>
  new StyleSet(styleSet.name, styleSet.description, styleSet.includedStyles);

interface SnapshotEntry {
  element: StyledElement;
  styleName: string | undefined;
}

interface StyledSnapshot {
  paragraphs: SnapshotEntry[];
  runs: SnapshotEntry[];
  tables: SnapshotEntry[];
}

function matchPattern(rawPattern: string, snapshot: StyledSnapshot): StyledElement[] {
  const pattern = rawPattern.trim().toLowerCase();
  const elements = (entries: SnapshotEntry[], test: (styleName: string | undefined) => boolean) =>
    entries.filter((entry) => test(entry.styleName)).map((entry) => entry.element);
  const normalized = (styleName: string | undefined) => (styleName === undefined ? '' : normalizeStyleName(styleName));

  const heading = HEADING_PATTERN.exec(pattern);
  if (heading) {
    return elements(snapshot.paragraphs, (styleName) => normalized(styleName) === `heading${heading[1]}`);
  }
  if (pattern === 'heading*' || pattern === 'h*') {
    return elements(snapshot.paragraphs, (styleName) => ANY_HEADING.test(normalized(styleName)));
  }
  if (pattern === 'table' || pattern === 'tables') {
    return snapshot.tables.map((entry) => entry.element);
  }
  if (pattern === 'normal' || pattern === 'body') {
    return elements(snapshot.paragraphs, (styleName) => styleName === undefined || normalized(styleName) === 'normal');
  }
  if (pattern === 'code') {
    return [
      ...elements(snapshot.paragraphs, (styleName) => normalized(styleName) === 'code'),
      ...elements(snapshot.runs, (styleName) => normalized(styleName) === 'code'),
    ];
  }
  return [
    ...elements(snapshot.paragraphs, (styleName) => styleName === rawPattern),
    ...elements(snapshot.runs, (styleName) => styleName === rawPattern),
    ...elements(snapshot.tables, (styleName) => styleName === rawPattern),
  ];
}
