import { describe, it, expect } from "vitest";
import { transform, type EmbeddedSourceParser } from "../../src/transform.js";
import { TokenKind } from "../../src/lexer/tokens.js";
import { UsageContext } from "../../src/parser/context.js";
import { warning } from "../../src/errors/diagnostic.js";

describe("transform", () => {
  describe("rewriting", () => {
    it("lowers a call argument with a header", () => {
      const source = 'void main() {\n    writeln(i"Hello, $name!");\n}';
      const result = transform(source, "test.d");
      expect(result.errors).toEqual([]);
      expect(result.output).toBe(
        'void main() {\n    writeln(InterpolationHeader!("Hello, ", "name", "!")(), "Hello, ", name, "!");\n}',
      );
    });

    it("lowers without a header", () => {
      const result = transform('writeln(i"Hello, $name!");', "test.d", { header: false });
      expect(result.output).toBe('writeln("Hello, ", name, "!");');
    });

    it("renders the header under a configured symbol", () => {
      const result = transform('f(i"$x");', "test.d", { headerSymbol: "Interp" });
      expect(result.output).toBe('f(Interp!("", "x", "")(), "", x, "");');
    });

    it("follows the brace convention", () => {
      const result = transform(
        'writeln(i"I ate {apples} and {bananas} totalling {apples + bananas} fruit.");',
        "test.d",
        { convention: "brace", header: false },
      );
      expect(result.errors).toEqual([]);
      expect(result.output).toBe(
        'writeln("I ate ", apples, " and ", bananas, " totalling ", apples + bananas, " fruit.");',
      );
    });

    it("resolves backslash escapes in literal text", () => {
      const result = transform('writeln(i"tab\\there $x");', "test.d", { header: false });
      expect(result.output).toBe('writeln("tab\\there ", x, "");');
    });

    it("keeps quoted strings inside embedded expressions", () => {
      const result = transform('writeln(i"$(f(")"))");', "test.d", { header: false });
      expect(result.errors).toEqual([]);
      expect(result.output).toBe('writeln("", f(")"), "");');
    });

    it("drops empty fragments under compact normalization", () => {
      const result = transform('writeln(i"$a$b");', "test.d", { normalization: "compact" });
      expect(result.output).toBe("writeln(a, b);");
    });

    it("lowers literals nested in embedded expressions", () => {
      const result = transform('f(i"$(g(i"a $b"))");', "test.d", { header: false });
      expect(result.errors).toEqual([]);
      expect(result.output).toBe('f("", g("a ", b, ""), "");');
    });

    it("keeps the unlowered nested literal in the header", () => {
      const result = transform('f(i"$(g(i"a $b"))");', "test.d");
      expect(result.output).toBe(
        'f(InterpolationHeader!("", "g(i\\"a $b\\")", "")(), "", ' +
          'g(InterpolationHeader!("a ", "b", "")(), "a ", b, ""), "");',
      );
    });

    it("leaves embedded string literals that merely end in i alone", () => {
      const result = transform('f(i"$(g("hi"))");', "test.d", { header: false });
      expect(result.output).toBe('f("", g("hi"), "");');
    });

    it("leaves source without interpolated literals untouched", () => {
      const source = 'writeln("plain", 42);';
      const result = transform(source, "test.d");
      expect(result.literals).toEqual([]);
      expect(result.output).toBe(source);
    });

    it("records the usage context of every literal", () => {
      const result = transform('mixin(i"int $n;");\nassert(ok, i"$why");', "test.d");
      expect(result.literals?.map((l) => l.lowered.context)).toEqual([
        UsageContext.MixinArguments,
        UsageContext.AssertArguments,
      ]);
    });
  });

  describe("diagnostics", () => {
    it("rejects a literal outside an argument list and keeps going", () => {
      const result = transform('auto s = i"hi $x";\nwriteln(i"ok $y");', "test.d");
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe("IllegalContext");
      expect(result.errors[0].span.start.line).toBe(1);
      expect(result.errors[0].span.start.column).toBe(10);
      expect(result.literals).toHaveLength(1);
      expect(result.output).toBeUndefined();
    });

    it("keeps a lone closing brace as literal text", () => {
      const result = transform('writeln(i"a } {b}");', "test.d", { convention: "brace", header: false });
      expect(result.errors).toEqual([]);
      expect(result.output).toBe('writeln("a } ", b, "");');
    });

    it("rejects literals hidden in negations and casts", () => {
      for (const source of ['void f() { if (!(i"x $y")) {} }', 'void f() { g(cast(string)(i"x $y")); }']) {
        const result = transform(source, "test.d");
        expect(result.errors.map((e) => e.code)).toEqual(["IllegalContext"]);
        expect(result.output).toBeUndefined();
      }
    });

    it("positions errors from nested literals in the outer source", () => {
      const result = transform('f(i"$(x ~ i"a $b")");', "test.d");
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe("IllegalContext");
      expect(result.errors[0].span.start).toEqual({ offset: 10, line: 1, column: 11 });
      expect(result.output).toBeUndefined();
    });

    it("reports an unterminated literal as a lexical error", () => {
      const result = transform('writeln(i"abc', "test.d");
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe("LexicalError");
      expect(result.errors[0].message).toBe("Unterminated interpolated string literal");
    });

    it("rejects an empty embedded expression", () => {
      const result = transform('writeln(i"x $() y");', "test.d");
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].code).toBe("EmbeddedSyntax");
      expect(result.errors[0].message).toBe("Empty embedded expression");
      expect(result.errors[0].span.start).toEqual({ offset: 14, line: 1, column: 15 });
    });

    it("positions lexical errors inside embedded source", () => {
      const result = transform('writeln(i"v $(a € b)");', "test.d");
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].message).toBe("Unexpected character: '€'");
      expect(result.errors[0].span.start).toEqual({ offset: 16, line: 1, column: 17 });
    });

    it("warns about a literal with nothing embedded", () => {
      const result = transform('writeln(i"just text");', "test.d", { header: false });
      expect(result.errors).toEqual([]);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].code).toBe("PlainInterpolation");
      expect(result.output).toBe('writeln("just text");');
    });

    it("refuses a header with compact normalization", () => {
      expect(() => transform('f(i"$x");', "test.d", { normalization: "compact", header: true })).toThrow(
        "An interpolation header requires 'strict' normalization",
      );
    });
  });

  describe("embedded source parser", () => {
    it("hands every embed to the configured parser", () => {
      const seen: string[] = [];
      const parser: EmbeddedSourceParser = {
        parse(text, span) {
          seen.push(text);
          return text === "legacy" ? [warning("Deprecated name", span)] : [];
        },
      };
      const result = transform('f(i"$a and $(legacy)");', "test.d", { embeddedParser: parser, header: false });
      expect(seen).toEqual(["a", "legacy"]);
      expect(result.warnings.map((w) => w.message)).toEqual(["Deprecated name"]);
      expect(result.output).toBe('f("", a, " and ", legacy, "");');
    });
  });

  describe("intermediate output", () => {
    it("stops after lexing when tokens are requested", () => {
      const result = transform('f(i"$x");', "test.d", { emitTokens: true });
      expect(result.tokens?.map((t) => t.kind)).toEqual([
        TokenKind.Identifier, TokenKind.LParen, TokenKind.InterpolatedString,
        TokenKind.RParen, TokenKind.Semicolon, TokenKind.EOF,
      ]);
      expect(result.literals).toBeUndefined();
      expect(result.output).toBeUndefined();
    });

    it("stops after lowering when parts are requested", () => {
      const result = transform('f(i"a$x");', "test.d", { emitParts: true });
      expect(result.literals?.[0].lowered.parts).toEqual([
        { kind: "LiteralFragment", text: "a", offset: 0 },
        { kind: "EmbeddedSource", text: "x", form: "identifier", offset: 2, start: 1, end: 3 },
        { kind: "LiteralFragment", text: "", offset: 3 },
      ]);
      expect(result.output).toBeUndefined();
    });
  });
});
