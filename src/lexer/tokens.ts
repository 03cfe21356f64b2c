import type { Position, Span } from "../errors/diagnostic.js";

export enum TokenKind {
  // Literals
  IntLiteral = "IntLiteral",
  FloatLiteral = "FloatLiteral",
  StringLiteral = "StringLiteral",
  CharLiteral = "CharLiteral",
  InterpolatedString = "InterpolatedString",

  // Identifiers
  Identifier = "Identifier",

  // Keywords that open interpolation-capable argument lists
  Mixin = "mixin",
  Pragma = "pragma",
  Assert = "assert",
  New = "new",
  // Every other reserved word
  Keyword = "Keyword",

  // Delimiters
  LParen = "(",
  RParen = ")",
  LBrace = "{",
  RBrace = "}",
  LBracket = "[",
  RBracket = "]",

  // Punctuation
  Bang = "!",
  Comma = ",",
  Dot = ".",
  Semicolon = ";",
  Eq = "=",
  Operator = "Operator",

  // Special
  EOF = "EOF",
  Error = "Error",
}

export interface Token {
  kind: TokenKind;
  value: string;
  span: Span;
  // Only present for InterpolatedString tokens.
  // i"Hello $name!" → raw: "Hello $name!", start: position of 'H'
  interpolation?: {
    raw: string;
    start: Position;
  };
}
