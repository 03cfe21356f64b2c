import { describe, it, expect } from "vitest";
import { Lexer } from "../../src/lexer/lexer.js";
import { TokenKind } from "../../src/lexer/tokens.js";
import { BRACE_CONVENTION } from "../../src/lowering/convention.js";

describe("Lexer", () => {
  function tokenKinds(source: string): TokenKind[] {
    const lexer = new Lexer(source, "test.d");
    return lexer.tokenize().map((t) => t.kind);
  }

  function tokenValues(source: string): string[] {
    const lexer = new Lexer(source, "test.d");
    return lexer.tokenize().map((t) => t.value);
  }

  it("tokenizes empty input", () => {
    expect(tokenKinds("")).toEqual([TokenKind.EOF]);
  });

  it("tokenizes a call with an interpolated literal", () => {
    expect(tokenKinds('writeln(i"Hello $name!");')).toEqual([
      TokenKind.Identifier, TokenKind.LParen, TokenKind.InterpolatedString,
      TokenKind.RParen, TokenKind.Semicolon, TokenKind.EOF,
    ]);
  });

  it("hands over the raw interior and where it starts", () => {
    const tokens = new Lexer('writeln(i"Hello $name!");', "test.d").tokenize();
    const tok = tokens[2];
    expect(tok.value).toBe("Hello $name!");
    expect(tok.interpolation).toEqual({
      raw: "Hello $name!",
      start: { offset: 10, line: 1, column: 11 },
    });
    expect(tok.span.start).toEqual({ offset: 8, line: 1, column: 9 });
    expect(tok.span.end).toEqual({ offset: 23, line: 1, column: 24 });
  });

  it("tracks the interior position across lines", () => {
    const tokens = new Lexer('foo();\n  f(i"x")', "test.d").tokenize();
    const tok = tokens.find((t) => t.kind === TokenKind.InterpolatedString);
    expect(tok?.interpolation?.start).toEqual({ offset: 13, line: 2, column: 7 });
  });

  it("lets embedded expressions contain string literals", () => {
    const tokens = new Lexer('f(i"a $(g(")")) b")', "test.d").tokenize();
    expect(tokens.map((t) => t.kind)).toEqual([
      TokenKind.Identifier, TokenKind.LParen, TokenKind.InterpolatedString, TokenKind.RParen, TokenKind.EOF,
    ]);
    expect(tokens[2].value).toBe('a $(g(")")) b');
  });

  it("skips escaped quotes outside captures", () => {
    const tokens = new Lexer('f(i"say \\"$x\\"")', "test.d").tokenize();
    expect(tokens[2].value).toBe('say \\"$x\\"');
  });

  it("follows the brace convention when asked", () => {
    const tokens = new Lexer('f(i"{{x}} {g("}")}")', "test.d", BRACE_CONVENTION).tokenize();
    expect(tokens[2].kind).toBe(TokenKind.InterpolatedString);
    expect(tokens[2].value).toBe('{{x}} {g("}")}');
  });

  it("reports unterminated interpolated literals", () => {
    const tokens = new Lexer('f(i"abc', "test.d").tokenize();
    expect(tokens[2].kind).toBe(TokenKind.Error);
    expect(tokens[2].value).toBe("Unterminated interpolated string literal");
  });

  it("tokenizes strings with escapes", () => {
    const tokens = new Lexer('"a\\tb"', "test.d").tokenize();
    expect(tokens[0].kind).toBe(TokenKind.StringLiteral);
    expect(tokens[0].value).toBe("a\tb");
  });

  it("tokenizes raw and character literals", () => {
    const tokens = new Lexer("`a\\n` 'x' '\\n'", "test.d").tokenize();
    expect(tokens.map((t) => t.kind)).toEqual([
      TokenKind.StringLiteral, TokenKind.CharLiteral, TokenKind.CharLiteral, TokenKind.EOF,
    ]);
    expect(tokens.map((t) => t.value)).toEqual(["a\\n", "x", "\n", ""]);
  });

  it("reports unterminated strings", () => {
    const tokens = new Lexer('"unterminated', "test.d").tokenize();
    expect(tokens[0].kind).toBe(TokenKind.Error);
  });

  it("tokenizes keywords", () => {
    expect(tokenKinds("mixin pragma assert new if foo")).toEqual([
      TokenKind.Mixin, TokenKind.Pragma, TokenKind.Assert, TokenKind.New,
      TokenKind.Keyword, TokenKind.Identifier, TokenKind.EOF,
    ]);
  });

  it("does not mistake an identifier named i for a literal prefix", () => {
    expect(tokenKinds("i + 1")).toEqual([
      TokenKind.Identifier, TokenKind.Operator, TokenKind.IntLiteral, TokenKind.EOF,
    ]);
  });

  it("keeps != apart from a template bang", () => {
    expect(tokenKinds("a != b!(c)")).toEqual([
      TokenKind.Identifier, TokenKind.Operator, TokenKind.Identifier, TokenKind.Bang,
      TokenKind.LParen, TokenKind.Identifier, TokenKind.RParen, TokenKind.EOF,
    ]);
    expect(tokenValues("a != b")[1]).toBe("!=");
  });

  it("tokenizes numbers with suffixes", () => {
    expect(tokenKinds("1_000UL 2.5f 0xFF")).toEqual([
      TokenKind.IntLiteral, TokenKind.FloatLiteral, TokenKind.IntLiteral, TokenKind.EOF,
    ]);
    expect(tokenValues("2.5f")[0]).toBe("2.5f");
  });

  it("skips comments", () => {
    expect(tokenKinds("a /* c */ b // d\nc")).toEqual([
      TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier, TokenKind.EOF,
    ]);
  });

  it("reports unterminated block comments", () => {
    const tokens = new Lexer("a /* b", "test.d").tokenize();
    expect(tokens[1].kind).toBe(TokenKind.Error);
    expect(tokens[1].value).toBe("Unterminated block comment");
  });

  it("tracks line and column numbers", () => {
    const tokens = new Lexer("foo\nbar", "test.d").tokenize();
    expect(tokens[0].span.start.line).toBe(1);
    expect(tokens[0].span.start.column).toBe(1);
    expect(tokens[1].span.start.line).toBe(2);
    expect(tokens[1].span.start.column).toBe(1);
  });
});
