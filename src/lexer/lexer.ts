import { TokenKind, type Token } from "./tokens.js";
import { KEYWORDS, RESERVED } from "./keywords.js";
import { DOLLAR_CONVENTION, isIdentPart, isIdentStart, isSelfDelimiting, type EscapeConvention } from "../lowering/convention.js";
import { resolveEscape } from "../lowering/escapes.js";
import type { Position } from "../errors/diagnostic.js";

/**
 * Tokenizer for D-like host source. It only knows enough of the host
 * grammar to find argument lists and interpolated literals; everything
 * else is passed through as identifiers, literals and operators.
 */
export class Lexer {
  private source: string;
  private filename: string;
  private convention: EscapeConvention;
  private pos: number = 0;
  private line: number = 1;
  private col: number = 1;

  constructor(source: string, filename: string = "<stdin>", convention: EscapeConvention = DOLLAR_CONVENTION) {
    this.source = source;
    this.filename = filename;
    this.convention = convention;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.source.length) {
      const commentError = this.skipWhitespaceAndComments();
      if (commentError) {
        tokens.push(commentError);
        continue;
      }
      if (this.pos >= this.source.length) break;
      tokens.push(this.nextToken());
    }
    tokens.push(this.makeToken(TokenKind.EOF, "", this.pos, this.line, this.col));
    return tokens;
  }

  private nextToken(): Token {
    const ch = this.source[this.pos];
    const next = this.peekChar(1);

    if (ch === "i" && next === '"') return this.readInterpolated();
    if (this.isDigit(ch)) return this.readNumber();
    if (isIdentStart(ch)) return this.readIdentOrKeyword();
    if (ch === '"') return this.readString();
    if (ch === "`") return this.readRawString();
    if (ch === "'") return this.readChar();

    return this.readPunctuation();
  }

  private readNumber(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    let isFloat = false;

    while (this.pos < this.source.length && (this.isDigit(this.source[this.pos]) || this.source[this.pos] === "_")) {
      this.advance();
    }

    if (this.source[this.pos] === "." && this.isDigit(this.peekChar(1))) {
      isFloat = true;
      this.advance(); // skip '.'
      while (this.pos < this.source.length && (this.isDigit(this.source[this.pos]) || this.source[this.pos] === "_")) {
        this.advance();
      }
    }

    // Suffixes and hex digits (0xFF, 10UL, 1.5f)
    while (this.pos < this.source.length && isIdentPart(this.source[this.pos])) {
      this.advance();
    }

    const value = this.source.slice(startPos, this.pos);
    return this.makeToken(
      isFloat ? TokenKind.FloatLiteral : TokenKind.IntLiteral,
      value,
      startPos,
      startLine,
      startCol,
    );
  }

  private readIdentOrKeyword(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    while (this.pos < this.source.length && isIdentPart(this.source[this.pos])) {
      this.advance();
    }

    const value = this.source.slice(startPos, this.pos);

    const keyword = KEYWORDS.get(value);
    if (keyword !== undefined) {
      return this.makeToken(keyword, value, startPos, startLine, startCol);
    }
    if (RESERVED.has(value)) {
      return this.makeToken(TokenKind.Keyword, value, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Identifier, value, startPos, startLine, startCol);
  }

  private readString(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    this.advance(); // skip opening "
    let value = "";

    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      if (this.source[this.pos] === "\\") {
        this.advance(); // skip backslash
        if (this.pos < this.source.length) {
          value += resolveEscape(this.source[this.pos]);
          this.advance();
        }
      } else {
        value += this.source[this.pos];
        this.advance();
      }
    }

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.Error, "Unterminated string literal", startPos, startLine, startCol);
    }

    this.advance(); // skip closing "
    return this.makeToken(TokenKind.StringLiteral, value, startPos, startLine, startCol);
  }

  private readRawString(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    this.advance(); // skip opening `
    const contentStart = this.pos;
    while (this.pos < this.source.length && this.source[this.pos] !== "`") {
      this.advance();
    }

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.Error, "Unterminated raw string literal", startPos, startLine, startCol);
    }

    const value = this.source.slice(contentStart, this.pos);
    this.advance(); // skip closing `
    return this.makeToken(TokenKind.StringLiteral, value, startPos, startLine, startCol);
  }

  private readChar(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;

    this.advance(); // skip opening '
    let value = "";
    if (this.source[this.pos] === "\\") {
      this.advance();
      if (this.pos < this.source.length) {
        value = resolveEscape(this.source[this.pos]);
        this.advance();
      }
    } else if (this.pos < this.source.length && this.source[this.pos] !== "'") {
      value = this.source[this.pos];
      this.advance();
    }

    if (this.source[this.pos] !== "'") {
      return this.makeToken(TokenKind.Error, "Unterminated character literal", startPos, startLine, startCol);
    }

    this.advance(); // skip closing '
    return this.makeToken(TokenKind.CharLiteral, value, startPos, startLine, startCol);
  }

  // Finds the extent of i"…" using the convention's grouping rules so that
  // embedded expressions may contain their own string literals. The
  // interior is handed over raw; the Lowerer resolves it.
  private readInterpolated(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const { introducer, groupOpen, groupClose } = this.convention;
    const selfDelimiting = isSelfDelimiting(this.convention);

    this.advance(); // skip 'i'
    this.advance(); // skip opening "
    const interiorStart: Position = { offset: this.pos, line: this.line, column: this.col };
    let depth = 0;

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      const next = this.peekChar(1);

      if (depth === 0) {
        if (ch === '"') break;
        if (ch === "\\" || (ch === introducer && next === introducer)) {
          this.advance();
          this.advance();
          continue;
        }
        if (ch === introducer && (selfDelimiting || next === groupOpen)) {
          if (!selfDelimiting) this.advance();
          this.advance();
          depth = 1;
          continue;
        }
        this.advance();
        continue;
      }

      if (ch === '"' || ch === "'") {
        if (!this.skipNestedQuoted()) break;
        continue;
      }
      if (ch === groupOpen) depth++;
      else if (ch === groupClose) depth--;
      this.advance();
    }

    if (this.pos >= this.source.length) {
      return this.makeToken(TokenKind.Error, "Unterminated interpolated string literal", startPos, startLine, startCol);
    }

    const raw = this.source.slice(interiorStart.offset, this.pos);
    this.advance(); // skip closing "
    const token = this.makeToken(TokenKind.InterpolatedString, raw, startPos, startLine, startCol);
    token.interpolation = { raw, start: interiorStart };
    return token;
  }

  // Skips a quoted string nested inside an embedded capture. Returns
  // false when the input ends first.
  private skipNestedQuoted(): boolean {
    const quote = this.source[this.pos];
    this.advance();
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === "\\") {
        this.advance();
        this.advance();
      } else if (ch === quote) {
        this.advance();
        return true;
      } else {
        this.advance();
      }
    }
    return false;
  }

  private readPunctuation(): Token {
    const startPos = this.pos;
    const startLine = this.line;
    const startCol = this.col;
    const ch = this.source[this.pos];
    const next = this.peekChar(1);

    // Two-character operators, so that `!=` is not taken for a template bang
    switch (ch + next) {
      case "!=":
      case "==":
      case "<=":
      case ">=":
      case "&&":
      case "||":
      case "~=":
      case "+=":
      case "-=":
      case "*=":
      case "/=":
      case "=>":
      case "..":
      case "++":
      case "--":
        this.advance();
        this.advance();
        return this.makeToken(TokenKind.Operator, ch + next, startPos, startLine, startCol);
    }

    // Single-character tokens
    this.advance();
    switch (ch) {
      case "(": return this.makeToken(TokenKind.LParen, ch, startPos, startLine, startCol);
      case ")": return this.makeToken(TokenKind.RParen, ch, startPos, startLine, startCol);
      case "{": return this.makeToken(TokenKind.LBrace, ch, startPos, startLine, startCol);
      case "}": return this.makeToken(TokenKind.RBrace, ch, startPos, startLine, startCol);
      case "[": return this.makeToken(TokenKind.LBracket, ch, startPos, startLine, startCol);
      case "]": return this.makeToken(TokenKind.RBracket, ch, startPos, startLine, startCol);
      case "!": return this.makeToken(TokenKind.Bang, ch, startPos, startLine, startCol);
      case ",": return this.makeToken(TokenKind.Comma, ch, startPos, startLine, startCol);
      case ".": return this.makeToken(TokenKind.Dot, ch, startPos, startLine, startCol);
      case ";": return this.makeToken(TokenKind.Semicolon, ch, startPos, startLine, startCol);
      case "=": return this.makeToken(TokenKind.Eq, ch, startPos, startLine, startCol);
      case "+":
      case "-":
      case "*":
      case "/":
      case "%":
      case "~":
      case "<":
      case ">":
      case "&":
      case "|":
      case "^":
      case "?":
      case ":":
      case "@":
      case "#":
      case "$":
        return this.makeToken(TokenKind.Operator, ch, startPos, startLine, startCol);
    }

    return this.makeToken(TokenKind.Error, `Unexpected character: '${ch}'`, startPos, startLine, startCol);
  }

  private skipWhitespaceAndComments(): Token | null {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      const next = this.peekChar(1);

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (ch === "/" && next === "/") {
        // Line comment
        while (this.pos < this.source.length && this.source[this.pos] !== "\n") {
          this.advance();
        }
      } else if (ch === "/" && next === "*") {
        const startPos = this.pos;
        const startLine = this.line;
        const startCol = this.col;
        this.advance();
        this.advance();
        while (this.pos < this.source.length && !(this.source[this.pos] === "*" && this.peekChar(1) === "/")) {
          this.advance();
        }
        if (this.pos >= this.source.length) {
          return this.makeToken(TokenKind.Error, "Unterminated block comment", startPos, startLine, startCol);
        }
        this.advance();
        this.advance();
      } else {
        break;
      }
    }
    return null;
  }

  private peekChar(ahead: number): string {
    return this.pos + ahead < this.source.length ? this.source[this.pos + ahead] : "";
  }

  private advance(): void {
    if (this.pos < this.source.length) {
      if (this.source[this.pos] === "\n") {
        this.line++;
        this.col = 1;
      } else {
        this.col++;
      }
      this.pos++;
    }
  }

  private makeToken(
    kind: TokenKind,
    value: string,
    startPos: number,
    startLine: number,
    startCol: number,
  ): Token {
    return {
      kind,
      value,
      span: {
        start: { offset: startPos, line: startLine, column: startCol },
        end: { offset: this.pos, line: this.line, column: this.col },
        source: this.filename,
      },
    };
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }
}
