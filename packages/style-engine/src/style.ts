import {
  StyleError,
  fail,
  ok,
  type Alignment,
  type CharacterStyleProperties,
  type ParagraphStyleProperties,
  type PropertyKind,
  type StyleFailure,
  type StyleResult,
  type StyleType,
  type TableStyleProperties,
} from '@docstyle/contracts';
import { CHARACTER_FIELDS, PARAGRAPH_FIELDS, TABLE_FIELDS, isEmptyBag } from './cascade.js';
import { serializeStyle } from './ooxml/styles-xml.js';
import {
  normalizeHexColor,
  validateCharacterProperties,
  validateFontSize,
  validateParagraphProperties,
  validateSpacing,
  validateTableProperties,
} from './validation.js';

/** Style types that may hold each property bag. */
const BAG_OWNERS: Record<PropertyKind, readonly StyleType[]> = {
  paragraph: ['paragraph', 'mixed'],
  character: ['character', 'mixed'],
  table: ['table'],
};

// Built-in status is written by the manager only; see markBuiltIn.
const builtInStyles = new WeakSet<Style>();

/**
 * A named, typed bundle of property bags with an optional base style.
 *
 * Property getters return frozen copies. Mutation goes through the validating setters,
 * which leave the style unchanged when they fail.
 */
export class Style {
  readonly name: string;
  readonly type: StyleType;

  #baseStyle: string | undefined;
  #paragraph: ParagraphStyleProperties = {};
  #character: CharacterStyleProperties = {};
  #table: TableStyleProperties = {};

  constructor(name: string, type: StyleType) {
    this.name = name;
    this.type = type;
  }

  get isBuiltIn(): boolean {
    return builtInStyles.has(this);
  }

  get baseStyle(): string | undefined {
    return this.#baseStyle;
  }

  get paragraphProperties(): Readonly<ParagraphStyleProperties> {
    return Object.freeze({ ...this.#paragraph });
  }

  get characterProperties(): Readonly<CharacterStyleProperties> {
    return Object.freeze({ ...this.#character });
  }

  get tableProperties(): Readonly<TableStyleProperties> {
    return Object.freeze({ ...this.#table });
  }

  /** Whether this style's type may hold the given property bag. */
  accepts(kind: PropertyKind): boolean {
    return BAG_OWNERS[kind].includes(this.type);
  }

  setParagraphProperties(props: ParagraphStyleProperties): StyleResult {
    const allowed = this.checkAccepts('paragraph', 'setParagraphProperties');
    if (!allowed.success) return allowed;
    const validated = validateParagraphProperties(props);
    if (!validated.success) return this.annotate(validated, 'setParagraphProperties');
    this.#paragraph = validated.value;
    return ok();
  }

  setCharacterProperties(props: CharacterStyleProperties): StyleResult {
    const allowed = this.checkAccepts('character', 'setCharacterProperties');
    if (!allowed.success) return allowed;
    const validated = validateCharacterProperties(props);
    if (!validated.success) return this.annotate(validated, 'setCharacterProperties');
    this.#character = validated.value;
    return ok();
  }

  setTableProperties(props: TableStyleProperties): StyleResult {
    const allowed = this.checkAccepts('table', 'setTableProperties');
    if (!allowed.success) return allowed;
    const validated = validateTableProperties(props);
    if (!validated.success) return this.annotate(validated, 'setTableProperties');
    this.#table = validated.value;
    return ok();
  }

  setBaseStyle(baseName: string): StyleResult {
    if (!baseName.trim()) {
      return fail('INVALID_ARGUMENT', 'Base style name cannot be empty', {
        operation: 'setBaseStyle',
        style: this.name,
      });
    }
    if (baseName === this.name) {
      return fail('STYLE_INHERITANCE_CYCLE', `Style '${this.name}' cannot inherit from itself`, {
        operation: 'setBaseStyle',
        style: this.name,
        value: baseName,
      });
    }
    this.#baseStyle = baseName;
    return ok();
  }

  clearBaseStyle(): void {
    this.#baseStyle = undefined;
  }

  /** Sets font name and size, keeping the other character properties. */
  setFont(fontName: string, size: number): StyleResult {
    const allowed = this.checkAccepts('character', 'setFont');
    if (!allowed.success) return allowed;
    if (!fontName.trim()) {
      return fail('VALIDATION_FAILED', 'Font name cannot be empty', {
        operation: 'setFont',
        style: this.name,
        field: 'fontName',
      });
    }
    const checked = validateFontSize(size);
    if (!checked.success) return this.annotate(checked, 'setFont');
    this.#character = { ...this.#character, fontName, fontSize: size };
    return ok();
  }

  setColor(hex: string): StyleResult {
    const allowed = this.checkAccepts('character', 'setColor');
    if (!allowed.success) return allowed;
    const color = normalizeHexColor(hex, 'fontColor');
    if (!color.success) return this.annotate(color, 'setColor');
    this.#character = { ...this.#character, fontColor: color.value };
    return ok();
  }

  setAlignment(alignment: Alignment): StyleResult {
    const allowed = this.checkAccepts('paragraph', 'setAlignment');
    if (!allowed.success) return allowed;
    const validated = validateParagraphProperties({ alignment });
    if (!validated.success) return this.annotate(validated, 'setAlignment');
    this.#paragraph = { ...this.#paragraph, alignment };
    return ok();
  }

  setSpacing(before: number, after: number): StyleResult {
    const allowed = this.checkAccepts('paragraph', 'setSpacing');
    if (!allowed.success) return allowed;
    const checkedBefore = validateSpacing(before, 'spaceBefore');
    if (!checkedBefore.success) return this.annotate(checkedBefore, 'setSpacing');
    const checkedAfter = validateSpacing(after, 'spaceAfter');
    if (!checkedAfter.success) return this.annotate(checkedAfter, 'setSpacing');
    this.#paragraph = { ...this.#paragraph, spaceBefore: before, spaceAfter: after };
    return ok();
  }

  /** Re-checks the name, the base link and every stored value. */
  validate(): StyleResult {
    if (!this.name.trim()) {
      return fail('VALIDATION_FAILED', 'Style name cannot be empty', { operation: 'validate' });
    }
    if (this.#baseStyle === this.name) {
      return fail('STYLE_INHERITANCE_CYCLE', `Style '${this.name}' cannot inherit from itself`, {
        operation: 'validate',
        style: this.name,
      });
    }

    const stored: [PropertyKind, boolean][] = [
      ['paragraph', !isEmptyBag(this.#paragraph, PARAGRAPH_FIELDS)],
      ['character', !isEmptyBag(this.#character, CHARACTER_FIELDS)],
      ['table', !isEmptyBag(this.#table, TABLE_FIELDS)],
    ];
    for (const [kind, present] of stored) {
      if (present && !this.accepts(kind)) {
        return fail('STYLE_PROPERTY_INVALID', `${this.type} style '${this.name}' holds ${kind} properties`, {
          operation: 'validate',
          style: this.name,
          field: kind,
        });
      }
    }

    const checks = [
      validateParagraphProperties(this.#paragraph),
      validateCharacterProperties(this.#character),
      validateTableProperties(this.#table),
    ];
    for (const check of checks) {
      if (!check.success) return this.annotate(check, 'validate');
    }
    return ok();
  }

  /** Serializes this style as a WordprocessingML `<w:style>` element. */
  toMarkup(): string {
    return serializeStyle(this);
  }

  private checkAccepts(kind: PropertyKind, operation: string): StyleResult {
    if (this.accepts(kind)) return ok();
    return fail('STYLE_PROPERTY_INVALID', `Cannot set ${kind} properties on ${this.type} style '${this.name}'`, {
      operation,
      style: this.name,
      field: kind,
    });
  }

  /** Adds the operation and style name to a validator failure. */
  private annotate(failure: StyleFailure, operation: string): StyleFailure {
    const { error } = failure;
    return fail(
      new StyleError(error.code, error.message, { ...error.details, operation, style: this.name }, error.causedBy),
    );
  }
}

/**
 * Flags a style as built in. Manager-scoped: exported for the registry, not re-exported
 * from the package root.
 */
export function markBuiltIn(style: Style): void {
  builtInStyles.add(style);
}
