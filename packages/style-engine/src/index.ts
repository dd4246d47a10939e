/**
 * @docstyle/style-engine
 *
 * Named styles for WordprocessingML documents: a registry with inheritance, style sets,
 * built-in styles, declarative stylesheet definitions and `styles.xml` output.
 */

export { StyleManager } from './style-manager.js';
export type {
  StyleManagerOptions,
  StyleSetApplication,
  StyleMappingApplication,
  StyleSheetImport,
} from './style-manager.js';

export { Style } from './style.js';
export { StyleSet } from './style-set.js';

export { StyleDefinitionParser, STYLESHEET_NAMESPACE, STYLESHEET_VERSION } from './definitions/definition-parser.js';
export type { StyleSheet } from './definitions/definition-parser.js';

export { BUILT_IN_STYLE_LIBRARY, BUILT_IN_LOAD_ORDER } from './built-in-styles.js';
export type { BuiltInStyleDefinition } from './built-in-styles.js';

export {
  StyleManagerConfigSchema,
  DefinitionParserOptionsSchema,
  DEFAULT_MAX_STYLE_NAME_LENGTH,
  DEFAULT_TABLE_WIDTH_REFERENCE,
} from './config.js';
export type {
  StyleManagerConfig,
  StyleManagerConfigInput,
  DefinitionParserOptions,
  DefinitionParserOptionsInput,
} from './config.js';

export {
  PARAGRAPH_FIELDS,
  CHARACTER_FIELDS,
  TABLE_FIELDS,
  PROPERTY_FIELDS,
  combineProperties,
  overlay,
  isEmptyBag,
} from './cascade.js';

export {
  MAX_FONT_SIZE,
  MAX_LIST_LEVEL,
  validateFontSize,
  normalizeHexColor,
  validateSpacing,
  validateParagraphProperties,
  validateCharacterProperties,
  validateTableProperties,
} from './validation.js';

export {
  POINTS_PER_UNIT,
  NAMED_COLORS,
  parseValueWithUnit,
  parsePercentage,
  parseColor,
  formatValueWithUnit,
  pointsToTwips,
  twipsToPoints,
  pointsToHalfPoints,
  pointsToEighths,
  lineSpacingToUnits,
} from './units.js';
export type { LengthUnit } from './units.js';

export { generateStylesXml, styleIdFor, XML_DECLARATION } from './ooxml/styles-xml.js';
