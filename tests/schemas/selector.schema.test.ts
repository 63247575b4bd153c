import { describe, it, expect } from 'vitest';
import {
  SelectorKindSchema,
  SelectorDescriptorSchema,
  SelectorGroupsMapSchema,
} from '../../src/schemas/selector.schema.js';
import { CliInputSchema } from '../../src/schemas/cli-input.schema.js';

describe('SelectorKindSchema', () => {
  it('accepts every built-in kind in any case', () => {
    expect(SelectorKindSchema.parse('css')).toBe('css');
    expect(SelectorKindSchema.parse('XPath')).toBe('xpath');
    expect(SelectorKindSchema.parse('TEXT')).toBe('text');
  });

  it('rejects unknown tokens', () => {
    expect(() => SelectorKindSchema.parse('role')).toThrow();
    expect(() => SelectorKindSchema.parse(3)).toThrow();
  });
});

describe('SelectorDescriptorSchema', () => {
  it('keeps bare strings as they are', () => {
    expect(SelectorDescriptorSchema.parse('#btn')).toBe('#btn');
  });

  it('turns tuples into { value, kind, timeoutMs } objects', () => {
    expect(SelectorDescriptorSchema.parse(['//p', 'xpath'])).toEqual({ value: '//p', kind: 'xpath', timeoutMs: undefined });
    expect(SelectorDescriptorSchema.parse(['Go', 'text', 100])).toEqual({ value: 'Go', kind: 'text', timeoutMs: 100 });
  });

  it('rejects numbers and one-element tuples', () => {
    expect(() => SelectorDescriptorSchema.parse(5)).toThrow();
    expect(() => SelectorDescriptorSchema.parse(['#only'])).toThrow();
  });
});

describe('SelectorGroupsMapSchema', () => {
  it('validates a map of groups', () => {
    const valid = {
      'login.submit': { selectors: ['button[type="submit"]', { kind: 'text', value: 'Sign in' }] },
    };
    expect(SelectorGroupsMapSchema.parse(valid)).toEqual(valid);
  });

  it('rejects a group without selectors', () => {
    expect(() => SelectorGroupsMapSchema.parse({ login: {} })).toThrow();
  });
});

describe('CliInputSchema', () => {
  it('fills option defaults', () => {
    const input = CliInputSchema.parse({ url: 'https://example.com', groups: {} });
    expect(input.options).toEqual({ headless: true, timeoutMs: 120_000, defaultSelectorTimeoutMs: 5000 });
  });

  it('rejects a malformed url', () => {
    expect(() => CliInputSchema.parse({ url: 'not a url', groups: {} })).toThrow();
  });
});
