import { describe, it, expect } from 'vitest';
import { compileRoutePattern } from './glob.js';
import { TranslationError } from '../types/index.js';

describe('compileRoutePattern', () => {
  it.each([
    ['llama3.*', 'llama3.1', true],
    ['llama3.*', 'llama3', false],
    ['llama3.*', 'xllama3.1', false],
    ['gpt-4?', 'gpt-4o', true],
    ['gpt-4?', 'gpt-4', false],
    ['gpt-[34]*', 'gpt-3.5-turbo', true],
    ['gpt-[!34]*', 'gpt-3.5-turbo', false],
    ['gpt-[!34]*', 'gpt-5', true],
    ['model-[a-c]', 'model-b', true],
    ['model-[a-c]', 'model-d', false],
    ['*', '', true],
    ['exact', 'exact', true],
    ['exact', 'exactly', false],
    ['a+b(c)', 'a+b(c)', true],
    ['literal\\*', 'literal*', true],
    ['literal\\*', 'literally', false],
  ])('%s against %s -> %s', (pattern, model, expected) => {
    expect(compileRoutePattern(pattern).test(model)).toBe(expected);
  });

  it('rejects an unterminated character class', () => {
    expect(() => compileRoutePattern('gpt-[34')).toThrow(
      new TranslationError("invalid model route pattern 'gpt-[34': unterminated character class"),
    );
  });

  it('rejects an empty character class', () => {
    expect(() => compileRoutePattern('gpt-[!]')).toThrow(/empty character class/);
  });

  it('rejects a trailing escape', () => {
    expect(() => compileRoutePattern('gpt\\')).toThrow(/trailing escape/);
  });

  it('rejects an out-of-order range', () => {
    expect(() => compileRoutePattern('model-[z-a]')).toThrow(TranslationError);
  });
});
