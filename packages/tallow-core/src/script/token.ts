/**
 * Token types produced by the scanner
 */
export enum TokenType {
  LeftParen = '(',
  RightParen = ')',
  LeftBrace = '{',
  RightBrace = '}',
  LeftBracket = '[',
  RightBracket = ']',
  Comma = ',',
  Dot = '.',
  Minus = '-',
  Plus = '+',
  Semicolon = ';',
  Colon = ':',
  Slash = '/',
  Star = '*',

  Bang = '!',
  BangEqual = '!=',
  Equal = '=',
  EqualEqual = '==',
  Greater = '>',
  GreaterEqual = '>=',
  Less = '<',
  LessEqual = '<=',

  Identifier = 'identifier',
  String = 'string',
  Number = 'number',

  And = 'and',
  Class = 'class',
  Else = 'else',
  False = 'false',
  For = 'for',
  Fun = 'fun',
  If = 'if',
  Nil = 'nil',
  Or = 'or',
  Print = 'print',
  Return = 'return',
  Super = 'super',
  This = 'this',
  True = 'true',
  Var = 'var',
  While = 'while',

  Error = 'error',
  EOF = 'EOF',
}

export const keywords: ReadonlyMap<string, TokenType> = new Map([
  ['and', TokenType.And],
  ['class', TokenType.Class],
  ['else', TokenType.Else],
  ['false', TokenType.False],
  ['for', TokenType.For],
  ['fun', TokenType.Fun],
  ['if', TokenType.If],
  ['nil', TokenType.Nil],
  ['or', TokenType.Or],
  ['print', TokenType.Print],
  ['return', TokenType.Return],
  ['super', TokenType.Super],
  ['this', TokenType.This],
  ['true', TokenType.True],
  ['var', TokenType.Var],
  ['while', TokenType.While],
]);

/**
 * Token with source coordinates. For error tokens `lexeme` holds the
 * diagnostic message instead of source text.
 */
export interface Token {
  type: TokenType;
  lexeme: string;
  start: number;
  length: number;
  line: number;
  column: number;
}
