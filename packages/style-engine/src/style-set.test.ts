import { describe, expect, it } from 'vitest';
import { StyleSet } from './style-set.js';

describe('StyleSet', () => {
  it('keeps included styles in insertion order without duplicates', () => {
    const styleSet = new StyleSet('Report', 'Quarterly report', ['Heading 1', 'Normal', 'Heading 1']);
    styleSet.addStyle('Code');
    styleSet.addStyle('Normal');
    expect(styleSet.includedStyles).toEqual(['Heading 1', 'Normal', 'Code']);
    expect(styleSet.size).toBe(3);
  });

  it('returns a copy of the included styles', () => {
    const styleSet = new StyleSet('Report', '', ['Normal']);
    const names = [...styleSet.includedStyles, 'Extra'];
    expect(names).toHaveLength(2);
    expect(styleSet.includedStyles).toEqual(['Normal']);
  });

  it('removes styles by name', () => {
    const styleSet = new StyleSet('Report', '', ['Normal', 'Code']);
    expect(styleSet.removeStyle('Normal')).toBe(true);
    expect(styleSet.removeStyle('Normal')).toBe(false);
    expect(styleSet.hasStyle('Code')).toBe(true);
    expect(styleSet.hasStyle('Normal')).toBe(false);
  });

  it('allows the description to change', () => {
    const styleSet = new StyleSet('Report');
    expect(styleSet.description).toBe('');
    styleSet.description = 'Updated';
    expect(styleSet.description).toBe('Updated');
  });
});
