import { describe, it, expect } from 'vitest';
import {
  computeLineStarts,
  isBlockOpener,
  lineAt,
  nextSignificant,
  previousSignificant,
  tokenize,
} from './lexer.js';

function shape(text: string): Array<[string, string]> {
  return tokenize(text)
    .filter(token => token.kind !== 'newline')
    .map(token => [token.kind, token.text]);
}

describe('tokenize', () => {
  it('splits interpolated strings into fragments around the embedded code', () => {
    expect(shape('x = "a #{y} b" # note')).toEqual([
      ['identifier', 'x'],
      ['operator', '='],
      ['string', '"a #{'],
      ['identifier', 'y'],
      ['string', '} b"'],
      ['comment', '# note'],
    ]);
  });

  it('keeps keyword keys, atoms and module attributes apart from identifiers', () => {
    expect(shape('%{alerts: :alerts, a: @alerts}')).toEqual([
      ['operator', '%'],
      ['punct', '{'],
      ['key', 'alerts:'],
      ['atom', ':alerts'],
      ['punct', ','],
      ['key', 'a:'],
      ['attribute', '@alerts'],
      ['punct', '}'],
    ]);
  });

  it('treats heredoc bodies as opaque text', () => {
    const identifiers = tokenize('doc = """\nalerts = 1\n"""')
      .filter(token => token.kind === 'identifier')
      .map(token => token.text);
    expect(identifiers).toEqual(['doc']);
  });

  it('reads sigils with their modifiers as one string token', () => {
    expect(shape('list = ~w(alerts risks)a')).toEqual([
      ['identifier', 'list'],
      ['operator', '='],
      ['string', '~w(alerts risks)a'],
    ]);
  });

  it('prefers the longest operator', () => {
    expect(shape('a == b')[1]).toEqual(['operator', '==']);
    expect(shape('a === b')[1]).toEqual(['operator', '===']);
    expect(shape('a != b')[1]).toEqual(['operator', '!=']);
  });

  it('keeps predicate suffixes on identifiers but not before =', () => {
    expect(shape('valid? = ok')).toEqual([
      ['identifier', 'valid?'],
      ['operator', '='],
      ['identifier', 'ok'],
    ]);
    expect(shape('a!=b')).toEqual([
      ['identifier', 'a'],
      ['operator', '!='],
      ['identifier', 'b'],
    ]);
  });

  it('reads char literals', () => {
    expect(shape('c = ?a')).toEqual([
      ['identifier', 'c'],
      ['operator', '='],
      ['char', '?a'],
    ]);
  });

  it('records 0-based lines', () => {
    const tokens = tokenize('a\nb');
    expect(tokens.map(token => [token.kind, token.line])).toEqual([
      ['identifier', 0],
      ['newline', 0],
      ['identifier', 1],
    ]);
  });
});

describe('line helpers', () => {
  it('maps offsets to lines', () => {
    const starts = computeLineStarts('ab\ncd\n\nef');
    expect(starts).toEqual([0, 3, 6, 7]);
    expect(lineAt(starts, 0)).toBe(0);
    expect(lineAt(starts, 4)).toBe(1);
    expect(lineAt(starts, 6)).toBe(2);
    expect(lineAt(starts, 8)).toBe(3);
  });
});

describe('significant token navigation', () => {
  it('skips newlines and comments', () => {
    const tokens = tokenize('a # c\n\nb');
    const b = tokens.findIndex(token => token.text === 'b');
    expect(tokens[previousSignificant(tokens, b)]?.text).toBe('a');
    expect(tokens[nextSignificant(tokens, 0)]?.text).toBe('b');
    expect(nextSignificant(tokens, b)).toBe(-1);
    expect(previousSignificant(tokens, 0)).toBe(-1);
  });

  it('does not treat field access as a block opener', () => {
    const tokens = tokenize('opts.do');
    expect(isBlockOpener(tokens, 2)).toBe(false);
    expect(isBlockOpener(tokenize('if x do'), 2)).toBe(true);
  });
});
