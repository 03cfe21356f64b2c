import { TokenKind } from "./tokens.js";

export const KEYWORDS: Map<string, TokenKind> = new Map([
  ["mixin", TokenKind.Mixin],
  ["pragma", TokenKind.Pragma],
  ["assert", TokenKind.Assert],
  ["new", TokenKind.New],
]);

// Reserved words that never name a callee, so `if (` or `return (`
// opens a plain group rather than an argument list.
export const RESERVED: Set<string> = new Set([
  "alias", "auto", "break", "case", "cast", "catch", "class", "const",
  "continue", "default", "delete", "do", "else", "enum", "false", "final",
  "finally", "for", "foreach", "foreach_reverse", "function", "goto", "if",
  "immutable", "import", "in", "interface", "is", "module", "null", "out",
  "override", "private", "protected", "public", "ref", "return", "scope",
  "shared", "static", "struct", "switch", "template",
  "throw", "true", "try", "typeof", "union", "version", "while", "with",
]);
