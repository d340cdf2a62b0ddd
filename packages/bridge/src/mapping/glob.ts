import { TranslationError } from '../types/index.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function invalidPattern(pattern: string, reason: string, cause?: Error): TranslationError {
  return new TranslationError(`invalid model route pattern '${pattern}': ${reason}`, cause);
}

const MAX_ARRAY_INDEX = 2 ** 32 - 2;

/**
 * True for keys that JavaScript objects enumerate before all other keys
 * (canonical array indices such as `7`), so their position in a JSON
 * object is lost.
 */
export function isIndexLikePattern(pattern: string): boolean {
  return /^(0|[1-9]\d*)$/.test(pattern) && Number(pattern) <= MAX_ARRAY_INDEX;
}

/** Message for an index-like pattern, with an equivalent glob to use instead. */
export function indexLikePatternMessage(pattern: string): string {
  const equivalent = `[${pattern.charAt(0)}]${pattern.slice(1)}`;
  return `pattern '${pattern}' cannot keep its configured order; write it as '${equivalent}'`;
}

/**
 * Compiles a glob pattern into an anchored RegExp.
 *
 * - `*` matches any run of characters (including none)
 * - `?` matches exactly one character
 * - `[abc]`, `[a-z]` and `[!abc]` match character classes
 * - `\` escapes the next character
 */
export function compileRoutePattern(pattern: string): RegExp {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);

    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '\\') {
      if (i + 1 >= pattern.length) {
        throw invalidPattern(pattern, 'trailing escape');
      }
      i += 1;
      source += escapeRegExp(pattern.charAt(i));
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        throw invalidPattern(pattern, 'unterminated character class');
      }

      let body = pattern.slice(i + 1, close);
      const negated = body.startsWith('!') || body.startsWith('^');
      if (negated) {
        body = body.slice(1);
      }
      if (body.length === 0) {
        throw invalidPattern(pattern, 'empty character class');
      }

      source += `[${negated ? '^' : ''}${body.replace(/[\\\]^[]/g, '\\$&')}]`;
      i = close;
    } else {
      source += escapeRegExp(ch);
    }
  }

  try {
    return new RegExp(`^${source}$`);
  } catch (err) {
    throw invalidPattern(pattern, 'not a valid pattern', err instanceof Error ? err : undefined);
  }
}
