/**
 * Lint Engine — Source Normalizer Tests
 *
 * Expected strings are derived from the transition table: `{`, `}` and `;`
 * introduce line breaks, source newlines are dropped outside comments and
 * indentation is four spaces per level.
 */

import { describe, expect, it } from 'vitest';

import { INITIAL_STATE, normalize, step } from './normalizer.ts';

const TRANSITION_SOURCE = [
  'transition main(public a: u32, b: u32) -> u32 {',
  '    let c: u32 = a + b;',
  '    return c;',
  '}',
].join('\n');

describe('Lint Engine — Source Normalizer', () => {
  describe('normalize', () => {
    it('rewrites a one-line function into four lines', () => {
      const result = normalize('function f(){let x:u8=1;}');

      expect(result).toBe('function f( ){\n    let x: u8=1;\n    \n}');
      expect(result.split('\n')).toHaveLength(4);
    });

    it('formats a transition declaration', () => {
      expect(normalize(TRANSITION_SOURCE)).toBe(
        'transition main( public a: u32, b: u32 ) -> u32 {\n' +
          '    let c: u32 = a + b;\n' +
          '    return c;\n' +
          '    \n' +
          '}',
      );
    });

    it('collapses runs of spaces to one', () => {
      expect(normalize('let   x  =  1;')).toBe('let x = 1;');
    });

    it('drops source newlines outside comments', () => {
      expect(normalize('let a = 1\n+ 2;')).toBe('let a = 1+ 2;');
    });

    it('adds a space after colons and inside parentheses', () => {
      expect(normalize('x:u8')).toBe('x: u8');
      expect(normalize('x : u8')).toBe('x : u8');
      expect(normalize('(a)')).toBe('( a )');
      expect(normalize('()')).toBe('( )');
      expect(normalize('( a )')).toBe('( a )');
    });

    it('indents nested blocks by four spaces per level', () => {
      expect(normalize('a{b{c;}}')).toBe(
        'a{\n    b{\n        c;\n        \n    }\n    \n}',
      );
    });

    it('returns to column zero after balanced braces', () => {
      const lines = normalize('a{b;}c;').split('\n');

      expect(lines).toEqual(['a{', '    b;', '    ', '}', 'c;']);
    });

    it('drops a closing brace with no open brace', () => {
      expect(normalize('a}b')).toBe('ab');
    });

    it('copies comment text verbatim up to the source newline', () => {
      expect(normalize('// a;b {c} (d):  e\nx;')).toBe('// a;b {c} (d):  e\nx;');
    });

    it('indents the line after a comment inside a block', () => {
      expect(normalize('f{// note\ny;}')).toBe('f{\n    // note\n    y;\n    \n}');
    });

    it('leaves a single slash alone', () => {
      expect(normalize('a/b;')).toBe('a/b;');
    });

    it('trims trailing whitespace, including after a trailing comment', () => {
      expect(normalize('a;   ')).toBe('a;');
      expect(normalize('x; // trailing  ')).toBe('x;\n // trailing');
    });

    it('formats braces inside string literals like code', () => {
      expect(normalize('let s = "{";')).toBe('let s = "{\n    ";');
    });

    it('keeps characters outside the basic multilingual plane intact', () => {
      expect(normalize('let e = "😀";')).toBe('let e = "😀";');
    });

    it('returns an empty string for empty or whitespace-only input', () => {
      expect(normalize('')).toBe('');
      expect(normalize('  \n  ')).toBe('');
    });

    it('is idempotent', () => {
      const samples = [
        'function f(){let x:u8=1;}',
        TRANSITION_SOURCE,
        'a{b{c;}}d;',
        'f{// note {;}\ny;}',
        'call( a , b )  ;',
        'x; // trailing  \n  y;',
        '}stray{',
        'let s = "{";',
        'a/\n/b{c}',
        'x = 4/}/y{z;}',
      ];

      for (const sample of samples) {
        const once = normalize(sample);
        expect(normalize(once)).toBe(once);
      }
    });
  });

  describe('slashes joined by the output', () => {
    it('treats slashes brought together by a dropped newline as a comment', () => {
      expect(normalize('a/\n/b{c}')).toBe('a//b{c}');
    });

    it('treats slashes brought together by a dropped stray brace as a comment', () => {
      expect(normalize('x = 4/}/y{z;}')).toBe('x = 4//y{z;}');
    });

    it('keeps slashes separated by a space as code', () => {
      expect(normalize('a/ /b;')).toBe('a/ /b;');
    });
  });

  describe('step', () => {
    it('consumes both slashes of a comment opener', () => {
      const result = step(INITIAL_STATE, '/', '/', undefined);

      expect(result.emit).toBe('//');
      expect(result.consumed).toBe(2);
      expect(result.state.insideComment).toBe(true);
    });

    it('ends a comment on newline and restores indentation', () => {
      const state = { indentLevel: 2, insideBrace: true, insideComment: true };
      const result = step(state, '\n', 'x', 'c');

      expect(result.emit).toBe('\n        ');
      expect(result.state).toEqual({ indentLevel: 2, insideBrace: true, insideComment: false });
    });

    it('clears insideBrace once the last open brace closes', () => {
      const state = { indentLevel: 1, insideBrace: true, insideComment: false };
      const result = step(state, '}', undefined, ' ');

      expect(result.emit).toBe('\n}\n');
      expect(result.state).toEqual({ indentLevel: 0, insideBrace: false, insideComment: false });
    });
  });
});
