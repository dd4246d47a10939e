import {
  BUILT_IN_STYLE_CATEGORIES,
  FormattingFlags,
  type BuiltInStyleCategory,
  type CharacterStyleProperties,
  type ParagraphStyleProperties,
  type StyleType,
} from '@docstyle/contracts';

export interface BuiltInStyleDefinition {
  name: string;
  type: StyleType;
  paragraph?: ParagraphStyleProperties;
  character?: CharacterStyleProperties;
}

const BODY_FONT = 'Calibri';
const MONOSPACE_FONT = 'Consolas';

/** Heading 1 is 16pt; each level below is 2pt smaller. */
const headings = [1, 2, 3, 4, 5, 6].map((level): BuiltInStyleDefinition => ({
  name: `Heading ${level}`,
  type: 'mixed',
  paragraph: { alignment: 'left', spaceBefore: 12, spaceAfter: 6 },
  character: { fontName: BODY_FONT, fontSize: 18 - level * 2, formatting: FormattingFlags.bold },
}));

export const BUILT_IN_STYLE_LIBRARY: Readonly<Record<BuiltInStyleCategory, readonly BuiltInStyleDefinition[]>> = {
  heading: headings,
  'body-text': [
    {
      name: 'Normal',
      type: 'mixed',
      paragraph: { alignment: 'left', spaceAfter: 6 },
      character: { fontName: BODY_FONT, fontSize: 11 },
    },
  ],
  // Reserved.
  list: [],
  table: [],
  technical: [
    {
      name: 'Code',
      type: 'character',
      character: { fontName: MONOSPACE_FONT, fontSize: 10, fontColor: '333333' },
    },
  ],
};

/** Categories in the order `loadAllBuiltInStyles` loads them. */
export const BUILT_IN_LOAD_ORDER: readonly BuiltInStyleCategory[] = BUILT_IN_STYLE_CATEGORIES;
