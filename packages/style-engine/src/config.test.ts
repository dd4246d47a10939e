import { describe, expect, it } from 'vitest';
import { StyleError } from '@docstyle/contracts';
import { DefinitionParserOptionsSchema, StyleManagerConfigSchema, parseConfig } from './config.js';

describe('config - parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig(StyleManagerConfigSchema, undefined, 'test')).toEqual({
      maxStyleNameLength: 255,
      logLevel: 'warn',
    });
    expect(parseConfig(DefinitionParserOptionsSchema, {}, 'test')).toEqual({ tableWidthReference: 400 });
  });

  it('keeps provided values', () => {
    expect(parseConfig(StyleManagerConfigSchema, { maxStyleNameLength: 40, logLevel: 'silent' }, 'test')).toEqual({
      maxStyleNameLength: 40,
      logLevel: 'silent',
    });
  });

  it('throws an INVALID_ARGUMENT StyleError for bad input', () => {
    let thrown: unknown;
    try {
      parseConfig(StyleManagerConfigSchema, { maxStyleNameLength: 0 }, 'StyleManager');
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(StyleError);
    if (!(thrown instanceof StyleError)) return;
    expect(thrown.code).toBe('INVALID_ARGUMENT');
    expect(thrown.details?.operation).toBe('StyleManager');
    expect(thrown.message.startsWith('Invalid configuration: maxStyleNameLength:')).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig(DefinitionParserOptionsSchema, { tableWidth: 10 }, 'test')).toThrow(StyleError);
  });
});
