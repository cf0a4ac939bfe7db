/**
 * Scanner - turns source text into tokens on demand
 *
 * Pull-based: the compiler calls `scanToken()` whenever it needs the next
 * token. Lines and columns are 1-based; the column is that of the token's
 * first character.
 */

import type { Source } from './source.js';
import { type Token, TokenType, keywords } from './token.js';

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isAlpha(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

export class Scanner {
  private start = 0;
  private current = 0;
  private line = 1;
  private column = 1;
  private startLine = 1;
  private startColumn = 1;
  private readonly text: string;

  constructor(public readonly source: Source) {
    this.text = source.text;
  }

  private isAtEnd(): boolean {
    return this.current >= this.text.length;
  }

  private advance(): string {
    const c = this.text[this.current++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private peek(): string {
    return this.isAtEnd() ? '\0' : this.text[this.current];
  }

  private peekNext(): string {
    return this.current + 1 >= this.text.length ? '\0' : this.text[this.current + 1];
  }

  private match(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.advance();
    return true;
  }

  private makeToken(type: TokenType): Token {
    return {
      type,
      lexeme: this.text.slice(this.start, this.current),
      start: this.start,
      length: this.current - this.start,
      line: this.startLine,
      column: this.startColumn,
    };
  }

  private errorToken(message: string): Token {
    return {
      type: TokenType.Error,
      lexeme: message,
      start: this.start,
      length: this.current - this.start,
      line: this.startLine,
      column: this.startColumn,
    };
  }

  private skipWhitespace(): void {
    for (;;) {
      switch (this.peek()) {
        case ' ':
        case '\r':
        case '\t':
        case '\n':
          this.advance();
          break;
        case '/':
          if (this.peekNext() !== '/') return;
          // A comment goes until the end of the line.
          while (this.peek() !== '\n' && !this.isAtEnd()) this.advance();
          break;
        default:
          return;
      }
    }
  }

  private string(): Token {
    while (this.peek() !== '"' && !this.isAtEnd()) this.advance();
    if (this.isAtEnd()) return this.errorToken('Unterminated string.');

    // The closing quote.
    this.advance();
    return this.makeToken(TokenType.String);
  }

  private number(): Token {
    while (isDigit(this.peek())) this.advance();

    if (this.peek() === '.' && isDigit(this.peekNext())) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    return this.makeToken(TokenType.Number);
  }

  private identifier(): Token {
    while (isAlpha(this.peek()) || isDigit(this.peek())) this.advance();
    const text = this.text.slice(this.start, this.current);
    return this.makeToken(keywords.get(text) ?? TokenType.Identifier);
  }

  scanToken(): Token {
    this.skipWhitespace();

    this.start = this.current;
    this.startLine = this.line;
    this.startColumn = this.column;
    if (this.isAtEnd()) return this.makeToken(TokenType.EOF);

    const c = this.advance();
    if (isAlpha(c)) return this.identifier();
    if (isDigit(c)) return this.number();

    switch (c) {
      case '(': return this.makeToken(TokenType.LeftParen);
      case ')': return this.makeToken(TokenType.RightParen);
      case '{': return this.makeToken(TokenType.LeftBrace);
      case '}': return this.makeToken(TokenType.RightBrace);
      case '[': return this.makeToken(TokenType.LeftBracket);
      case ']': return this.makeToken(TokenType.RightBracket);
      case ',': return this.makeToken(TokenType.Comma);
      case '.': return this.makeToken(TokenType.Dot);
      case '-': return this.makeToken(TokenType.Minus);
      case '+': return this.makeToken(TokenType.Plus);
      case ';': return this.makeToken(TokenType.Semicolon);
      case ':': return this.makeToken(TokenType.Colon);
      case '/': return this.makeToken(TokenType.Slash);
      case '*': return this.makeToken(TokenType.Star);
      case '!':
        return this.makeToken(this.match('=') ? TokenType.BangEqual : TokenType.Bang);
      case '=':
        return this.makeToken(this.match('=') ? TokenType.EqualEqual : TokenType.Equal);
      case '<':
        return this.makeToken(this.match('=') ? TokenType.LessEqual : TokenType.Less);
      case '>':
        return this.makeToken(this.match('=') ? TokenType.GreaterEqual : TokenType.Greater);
      case '"':
        return this.string();
    }

    return this.errorToken('Unexpected character.');
  }
}

/**
 * Scan a whole source into a token list ending with EOF.
 */
export function tokenize(source: Source): Token[] {
  const scanner = new Scanner(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = scanner.scanToken();
    tokens.push(token);
    if (token.type === TokenType.EOF) return tokens;
  }
}
