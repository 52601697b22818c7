/**
 * Elixir-aware tokenizer
 *
 * Produces a flat, offset-ordered token stream that is just detailed enough
 * for block matching and variable renaming: strings, heredocs, sigils and
 * comments become opaque tokens, interpolated code inside them is tokenized
 * like any other code, and atoms, keyword keys, module attributes and char
 * literals are kept apart from plain identifiers.
 */

export type TokenKind =
  | 'identifier'
  | 'alias'
  | 'atom'
  | 'key'
  | 'attribute'
  | 'string'
  | 'comment'
  | 'number'
  | 'char'
  | 'operator'
  | 'punct'
  | 'newline';

export interface Token {
  kind: TokenKind;
  text: string;
  start: number;
  end: number;
  line: number;
}

// Longest first so that `===` wins over `==` and `=`.
const OPERATORS = [
  '\\\\', '===', '!==', '|||', '&&&', '<<<', '>>>', '<<~', '~>>', '<~>', '<|>', '^^^', '~~~', '...',
  '::', '==', '!=', '=~', '=>', '<=', '>=', '->', '<-', '|>', '<>', '++', '--', '..', '&&', '||',
  '**', '//', '<<', '>>', '~>', '<~',
  '=', '+', '-', '*', '/', '<', '>', '|', '&', '!', '^', '.', '%', ':', '\\',
].sort((a, b) => b.length - a.length);

const PUNCTUATION = new Set(['(', ')', '[', ']', '{', '}', ',', ';']);

const SIGIL_PAIRS: Record<string, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
  '<': '>',
  '/': '/',
  '|': '|',
  '"': '"',
  "'": "'",
};

const IDENTIFIER = /[a-z_][A-Za-z0-9_]*(?:[?!](?!=))?/y;
const ALIAS = /[A-Z][A-Za-z0-9_]*/y;
const ATOM = /:[A-Za-z_][A-Za-z0-9_@]*[?!]?/y;
const ATTRIBUTE = /@[a-z_][A-Za-z0-9_]*[?!]?/y;
const NUMBER = /0x[0-9A-Fa-f_]+|0b[01_]+|0o[0-7_]+|[0-9][0-9_]*(?:\.[0-9][0-9_]*(?:[eE][+-]?[0-9]+)?)?/y;
const SIGIL_NAME = /~[A-Za-z][A-Za-z0-9]*/y;
const SIGIL_MODIFIERS = /[A-Za-z]*/y;

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/** 0-based line holding `offset`. */
export function lineAt(lineStarts: readonly number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

export function tokenize(text: string): Token[] {
  return new Lexer(text).run();
}

class Lexer {
  private pos = 0;
  private readonly tokens: Token[] = [];
  private readonly lineStarts: number[];

  constructor(private readonly text: string) {
    this.lineStarts = computeLineStarts(text);
  }

  run(): Token[] {
    this.lexCode(false);
    return this.tokens;
  }

  private push(kind: TokenKind, start: number, end: number): void {
    if (end <= start) {
      return;
    }
    this.tokens.push({
      kind,
      text: this.text.slice(start, end),
      start,
      end,
      line: lineAt(this.lineStarts, start),
    });
  }

  private match(pattern: RegExp): string | null {
    pattern.lastIndex = this.pos;
    const found = pattern.exec(this.text);
    return found ? found[0] : null;
  }

  /**
   * Tokenizes code until end of input or, inside an interpolation, until the
   * `}` that closes it (left unconsumed for the caller).
   */
  private lexCode(inInterpolation: boolean): void {
    const { text } = this;
    let braceDepth = 0;

    while (this.pos < text.length) {
      const ch = text.charAt(this.pos);
      const next = text.charAt(this.pos + 1);

      if (ch === '\n') {
        this.push('newline', this.pos, this.pos + 1);
        this.pos++;
        continue;
      }

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.pos++;
        continue;
      }

      if (inInterpolation && ch === '}' && braceDepth === 0) {
        return;
      }

      if (ch === '#') {
        const lineEnd = text.indexOf('\n', this.pos);
        const end = lineEnd === -1 ? text.length : lineEnd;
        this.push('comment', this.pos, end);
        this.pos = end;
        continue;
      }

      if (ch === '"' || ch === "'") {
        const triple = ch.repeat(3);
        if (text.startsWith(triple, this.pos)) {
          this.lexQuoted(this.pos, this.pos + 3, triple, true, 'string');
        } else {
          this.lexQuoted(this.pos, this.pos + 1, ch, true, 'string');
        }
        continue;
      }

      if (ch === '~' && /[A-Za-z]/.test(next)) {
        this.lexSigil();
        continue;
      }

      if (ch === ':' && (next === '"' || next === "'")) {
        this.lexQuoted(this.pos, this.pos + 2, next, true, 'atom');
        continue;
      }

      if (ch === ':' && next !== ':') {
        const atom = this.match(ATOM);
        if (atom) {
          this.push('atom', this.pos, this.pos + atom.length);
          this.pos += atom.length;
          continue;
        }
      }

      if (ch === '@') {
        const attribute = this.match(ATTRIBUTE);
        if (attribute) {
          this.push('attribute', this.pos, this.pos + attribute.length);
          this.pos += attribute.length;
          continue;
        }
      }

      if (ch === '?' && this.pos + 1 < text.length) {
        const width = next === '\\' ? 3 : 2;
        this.push('char', this.pos, Math.min(this.pos + width, text.length));
        this.pos += width;
        continue;
      }

      if (/[0-9]/.test(ch)) {
        const number = this.match(NUMBER) ?? ch;
        this.push('number', this.pos, this.pos + number.length);
        this.pos += number.length;
        continue;
      }

      if (/[a-z_]/.test(ch)) {
        const identifier = this.match(IDENTIFIER) ?? ch;
        const end = this.pos + identifier.length;
        // `name: value` is a keyword key, `name::type` is not
        if (text.charAt(end) === ':' && text.charAt(end + 1) !== ':') {
          this.push('key', this.pos, end + 1);
          this.pos = end + 1;
        } else {
          this.push('identifier', this.pos, end);
          this.pos = end;
        }
        continue;
      }

      if (/[A-Z]/.test(ch)) {
        const alias = this.match(ALIAS) ?? ch;
        this.push('alias', this.pos, this.pos + alias.length);
        this.pos += alias.length;
        continue;
      }

      if (PUNCTUATION.has(ch)) {
        if (ch === '{') {
          braceDepth++;
        } else if (ch === '}') {
          braceDepth--;
        }
        this.push('punct', this.pos, this.pos + 1);
        this.pos++;
        continue;
      }

      const operator = OPERATORS.find(op => text.startsWith(op, this.pos)) ?? ch;
      this.push('operator', this.pos, this.pos + operator.length);
      this.pos += operator.length;
    }
  }

  /**
   * Consumes a quoted literal whose body starts at `bodyStart` and ends with
   * `closer`. Text is emitted as `kind` fragments; interpolations in between
   * are tokenized as code. Unterminated literals run to end of input.
   */
  private lexQuoted(
    tokenStart: number,
    bodyStart: number,
    closer: string,
    interpolate: boolean,
    kind: TokenKind
  ): void {
    const { text } = this;
    let fragmentStart = tokenStart;
    this.pos = bodyStart;

    while (this.pos < text.length) {
      const ch = text.charAt(this.pos);

      if (ch === '\\') {
        this.pos += 2;
        continue;
      }

      if (text.startsWith(closer, this.pos)) {
        this.pos += closer.length;
        this.push(kind, fragmentStart, this.pos);
        return;
      }

      if (interpolate && ch === '#' && text.charAt(this.pos + 1) === '{') {
        this.push(kind, fragmentStart, this.pos + 2);
        this.pos += 2;
        this.lexCode(true);
        // the closing brace belongs to the next fragment
        fragmentStart = this.pos;
        if (this.pos < text.length) {
          this.pos++;
        }
        continue;
      }

      this.pos++;
    }

    this.pos = text.length;
    this.push(kind, fragmentStart, this.pos);
  }

  private lexSigil(): void {
    const { text } = this;
    const start = this.pos;
    const name = this.match(SIGIL_NAME) ?? '~';
    this.pos += name.length;

    const interpolate = /^~[a-z]/.test(name);
    const delimiter = text.charAt(this.pos);
    const triple = delimiter.repeat(3);

    if ((delimiter === '"' || delimiter === "'") && text.startsWith(triple, this.pos)) {
      this.lexQuoted(start, this.pos + 3, triple, interpolate, 'string');
    } else {
      const closer = SIGIL_PAIRS[delimiter];
      if (!closer) {
        // not a sigil after all; emit the name as an operator-ish token
        this.push('operator', start, this.pos);
        return;
      }
      this.lexQuoted(start, this.pos + 1, closer, interpolate, 'string');
    }

    const modifiers = this.match(SIGIL_MODIFIERS) ?? '';
    if (modifiers.length > 0) {
      const last = this.tokens[this.tokens.length - 1];
      if (last && last.kind === 'string' && last.end === this.pos) {
        last.end += modifiers.length;
        last.text = text.slice(last.start, last.end);
      }
      this.pos += modifiers.length;
    }
  }
}

/** Index of the closest token before `index` that is neither a newline nor a comment, or -1. */
export function previousSignificant(tokens: readonly Token[], index: number): number {
  for (let i = index - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token && token.kind !== 'newline' && token.kind !== 'comment') {
      return i;
    }
  }
  return -1;
}

/** Index of the closest token after `index` that is neither a newline nor a comment, or -1. */
export function nextSignificant(tokens: readonly Token[], index: number): number {
  for (let i = index + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token && token.kind !== 'newline' && token.kind !== 'comment') {
      return i;
    }
  }
  return -1;
}

function isKeyword(tokens: readonly Token[], index: number, words: readonly string[]): boolean {
  const token = tokens[index];
  if (!token || token.kind !== 'identifier' || !words.includes(token.text)) {
    return false;
  }
  // `range.end`, `opts.do` are field accesses
  const before = tokens[index - 1];
  return !(before && before.kind === 'operator' && before.text === '.');
}

export function isBlockOpener(tokens: readonly Token[], index: number): boolean {
  return isKeyword(tokens, index, ['do', 'fn']);
}

export function isBlockCloser(tokens: readonly Token[], index: number): boolean {
  return isKeyword(tokens, index, ['end']);
}

export function isWord(tokens: readonly Token[], index: number, word: string): boolean {
  return isKeyword(tokens, index, [word]);
}
