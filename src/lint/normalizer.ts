/**
 * Lint Engine — Source Normalizer
 *
 * Rewrites `.leo` source text into canonical form in a single forward pass.
 *
 * The automaton is character-driven:
 * - line breaks come only from `;`, `{`, `}` and the end of a `//` comment
 * - source newlines outside comments are dropped
 * - runs of spaces collapse to one
 * - comment text is copied verbatim up to the next source newline
 *
 * It has no notion of string literals: `{ } ; : ( )` inside a literal are
 * formatted like code.
 */

/** Spaces emitted per indentation level. */
export const INDENT_WIDTH = 4;

/**
 * Scan state carried from one character to the next.
 *
 * `insideBrace` is kept as its own flag rather than derived: `{` always sets
 * it and `}` recomputes it from the level, so it equals `indentLevel > 0` and
 * a `}` with no open brace is dropped.
 */
export interface NormalizerState {
  readonly indentLevel: number;
  readonly insideBrace: boolean;
  readonly insideComment: boolean;
}

export const INITIAL_STATE: NormalizerState = {
  indentLevel: 0,
  insideBrace: false,
  insideComment: false,
};

/**
 * Result of feeding one character to the automaton.
 */
interface Step {
  readonly state: NormalizerState;
  readonly emit: string;
  /** Number of input characters consumed, including the current one. */
  readonly consumed: 1 | 2;
}

function indentation(level: number): string {
  return ' '.repeat(INDENT_WIDTH * level);
}

/**
 * Apply the transition table to `char`, given the next input character and
 * the last character written so far.
 */
export function step(
  state: NormalizerState,
  char: string,
  next: string | undefined,
  lastEmitted: string | undefined,
): Step {
  if (state.insideComment) {
    if (char === '\n') {
      return {
        state: { ...state, insideComment: false },
        emit: `\n${indentation(state.indentLevel)}`,
        consumed: 1,
      };
    }
    return { state, emit: char, consumed: 1 };
  }

  switch (char) {
    case '{': {
      const indentLevel = state.indentLevel + 1;
      return {
        state: { ...state, indentLevel, insideBrace: true },
        emit: `{\n${indentation(indentLevel)}`,
        consumed: 1,
      };
    }
    case '}': {
      if (!state.insideBrace) {
        return { state, emit: '', consumed: 1 };
      }
      const indentLevel = state.indentLevel - 1;
      const pad = indentation(indentLevel);
      return {
        state: { ...state, indentLevel, insideBrace: indentLevel > 0 },
        emit: `\n${pad}}\n${pad}`,
        consumed: 1,
      };
    }
    case ';':
      return {
        state,
        emit: `;\n${indentation(state.indentLevel)}`,
        consumed: 1,
      };
    case ':':
      return { state, emit: ': ', consumed: 1 };
    case '(':
      return { state, emit: '( ', consumed: 1 };
    case ')':
      return { state, emit: lastEmitted === ' ' ? ')' : ' )', consumed: 1 };
    case '/':
      if (next === '/') {
        return { state: { ...state, insideComment: true }, emit: '//', consumed: 2 };
      }
      // A dropped newline or stray `}` can leave two slashes adjacent in the
      // output; they open a comment there, so they must open one here too.
      if (lastEmitted === '/') {
        return { state: { ...state, insideComment: true }, emit: char, consumed: 1 };
      }
      return { state, emit: char, consumed: 1 };
    case '\n':
      return { state, emit: '', consumed: 1 };
    case ' ':
      return { state, emit: lastEmitted === ' ' ? '' : ' ', consumed: 1 };
    default:
      return { state, emit: char, consumed: 1 };
  }
}

/**
 * Normalize a complete source text.
 *
 * @param source - Full contents of a `.leo` file.
 * @returns Canonical text with trailing whitespace removed.
 */
export function normalize(source: string): string {
  // Iterate by code point so surrogate pairs are copied intact.
  const chars = Array.from(source);
  let state = INITIAL_STATE;
  let out = '';

  for (let i = 0; i < chars.length; ) {
    const char = chars[i] ?? '';
    const result = step(state, char, chars[i + 1], out.at(-1));
    state = result.state;
    out += result.emit;
    i += result.consumed;
  }

  return out.trimEnd();
}
