import { Lexer } from "./lexer/lexer.js";
import { TokenKind, type Token } from "./lexer/tokens.js";
import { resolveContexts } from "./parser/context.js";
import { lower } from "./lowering/lowerer.js";
import { resolveConvention, type ConventionName, type EscapeConvention } from "./lowering/convention.js";
import type { NormalizationPolicy } from "./lowering/normalize.js";
import { isEmbedded, type LexError, type LoweredLiteral } from "./lowering/parts.js";
import { renderArguments, spliceArguments, type SplicedArgument } from "./splice/splice.js";
import { DEFAULT_CONFIG } from "./config.js";
import { error, shiftSpan, spanWithin, warning, type Diagnostic, type Span } from "./errors/diagnostic.js";

/**
 * The expression/type sub-parser that owns embedded source. Whatever it
 * reports is an ordinary diagnostic, never a lowering error.
 */
export interface EmbeddedSourceParser {
  parse(text: string, span: Span): Diagnostic[];
}

export interface TransformOptions {
  convention?: ConventionName;
  normalization?: NormalizationPolicy;
  header?: boolean;
  headerSymbol?: string;
  emitTokens?: boolean;
  emitParts?: boolean;
  embeddedParser?: EmbeddedSourceParser;
}

export interface LoweredSite {
  token: Token;
  lowered: LoweredLiteral;
  arguments: SplicedArgument[];
}

export interface TransformResult {
  tokens?: Token[];
  literals?: LoweredSite[];
  output?: string;
  /** Fatal diagnostics only (severity: "error"). Non-empty means the transform failed. */
  errors: Diagnostic[];
  /** Non-fatal diagnostics (severity: "warning" | "info"). */
  warnings: Diagnostic[];
}

/**
 * Checks that embedded source lexes as host code and is not empty.
 * Grammar is left to the downstream compiler.
 */
export function lexicalCheck(convention: EscapeConvention): EmbeddedSourceParser {
  return {
    parse(text: string, span: Span): Diagnostic[] {
      if (text.trim() === "") {
        return [error(
          "Empty embedded expression",
          span,
          `Put an expression inside the interpolation, or write '${convention.introducer}${convention.introducer}' for a literal '${convention.introducer}'`,
          "EmbeddedSyntax",
        )];
      }
      const tokens = new Lexer(text, span.source, convention).tokenize();
      return tokens
        .filter((t) => t.kind === TokenKind.Error)
        .map((t) => error(t.value, shiftSpan(t.span, span.start), undefined, "EmbeddedSyntax"));
    },
  };
}

/**
 * Lower every interpolated literal in `source` and splice the results
 * into their argument lists.
 */
export function transform(
  source: string,
  filename: string,
  options: TransformOptions = {},
): TransformResult {
  const convention = resolveConvention(options.convention ?? DEFAULT_CONFIG.convention);
  const normalization = options.normalization ?? DEFAULT_CONFIG.normalization;
  const header = options.header ?? normalization === "strict";
  const headerSymbol = options.headerSymbol ?? DEFAULT_CONFIG.headerSymbol;
  const embeddedParser = options.embeddedParser ?? lexicalCheck(convention);

  if (header && normalization !== "strict") {
    throw new Error("An interpolation header requires 'strict' normalization");
  }

  // 1. Lex
  const lexer = new Lexer(source, filename, convention);
  const tokens = lexer.tokenize();
  const lexErrors = tokens
    .filter((t) => t.kind === TokenKind.Error)
    .map((t) => error(t.value, t.span, undefined, "LexicalError"));

  if (options.emitTokens) {
    return { tokens, errors: lexErrors, warnings: [] };
  }
  if (lexErrors.length > 0) {
    return { tokens, errors: lexErrors, warnings: [] };
  }

  // 2. Usage contexts
  const errors: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];
  const literals: LoweredSite[] = [];

  for (const site of resolveContexts(tokens)) {
    if ("error" in site) {
      errors.push(site.error);
      continue;
    }

    const { token } = site;
    if (!token.interpolation) continue;
    const { raw, start } = token.interpolation;

    // 3. Lower; a bad literal does not stop the others
    const result = lower({ text: raw, start, source: filename }, site.context, {
      convention,
      normalization,
      backslashEscapes: true,
    });
    if (!result.ok) {
      errors.push(unbalanced(result.error, spanWithin(filename, start, raw, result.error.offset, 1), convention));
      continue;
    }

    // 4. Embedded source goes to the sub-parser; literals nested in it
    //    are lowered in place.
    const embedded = result.value.parts.filter(isEmbedded);
    const rewritten = new Map<number, string>();
    for (const part of embedded) {
      const span = spanWithin(filename, start, raw, part.offset, part.text.length);
      const diagnostics = embeddedParser.parse(part.text, span);
      for (const diag of diagnostics) {
        (diag.severity === "error" ? errors : warnings).push(diag);
      }
      if (diagnostics.some((d) => d.severity === "error") || !part.text.includes('i"')) continue;

      const nested = transform(part.text, filename, { ...options, emitTokens: false, emitParts: false });
      errors.push(...nested.errors.map((d) => ({ ...d, span: shiftSpan(d.span, span.start) })));
      warnings.push(...nested.warnings.map((d) => ({ ...d, span: shiftSpan(d.span, span.start) })));
      if (nested.output !== undefined && (nested.literals?.length ?? 0) > 0) {
        rewritten.set(part.offset, nested.output);
      }
    }
    if (embedded.length === 0) {
      warnings.push(warning(
        "Interpolated string literal has no embedded expressions",
        token.span,
        "Use a plain string literal",
        "PlainInterpolation",
      ));
    }

    literals.push({
      token,
      lowered: result.value,
      arguments: spliceArguments(result.value, { header, rewritten }),
    });
  }

  if (errors.length > 0) {
    return { tokens, literals, errors, warnings };
  }
  if (options.emitParts) {
    return { tokens, literals, errors: [], warnings };
  }

  // 5. Splice
  let output = "";
  let cursor = 0;
  for (const lit of literals) {
    output += source.slice(cursor, lit.token.span.start.offset);
    output += renderArguments(lit.arguments, headerSymbol);
    cursor = lit.token.span.end.offset;
  }
  output += source.slice(cursor);

  return { tokens, literals, output, errors: [], warnings };
}

function unbalanced(err: LexError, span: Span, convention: EscapeConvention): Diagnostic {
  return error(
    err.message,
    span,
    `Close every '${err.delimiter}' with '${convention.groupClose}' inside the interpolated expression`,
    "UnbalancedDelimiter",
  );
}
