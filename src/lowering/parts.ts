import type { Position } from "../errors/diagnostic.js";
import type { ConventionName } from "./convention.js";
import type { UsageContext } from "../parser/context.js";

/**
 * Raw interior of an `i"…"` token, as handed over by the host lexer.
 * `start` is the position of `text[0]` in the enclosing source.
 */
export interface InterpolatedLiteral {
  text: string;
  start: Position;
  source: string;
}

export interface LiteralFragment {
  kind: "LiteralFragment";
  /** Literal text with escapes resolved. */
  text: string;
  /** Offset within the raw interior where this fragment begins. */
  offset: number;
}

export type EmbeddedForm = "identifier" | "expression";

export interface EmbeddedSource {
  kind: "EmbeddedSource";
  /** Verbatim source, handed to the expression/type sub-parser. */
  text: string;
  form: EmbeddedForm;
  /** Offset of `text[0]` within the raw interior. */
  offset: number;
  /** Offset of the introducer. */
  start: number;
  /** Offset just past the capture, closing delimiter included. */
  end: number;
}

export type Part = LiteralFragment | EmbeddedSource;

export type PartSequence = readonly Part[];

export interface LoweredLiteral {
  context: UsageContext;
  convention: ConventionName;
  parts: PartSequence;
}

export interface LexError {
  code: "UnbalancedDelimiter";
  message: string;
  /** Offset of the offending delimiter within the raw interior. */
  offset: number;
  delimiter: string;
}

export type LowerResult =
  | { ok: true; value: LoweredLiteral }
  | { ok: false; error: LexError };

export function literalFragment(text: string, offset: number): LiteralFragment {
  return { kind: "LiteralFragment", text, offset };
}

export function isEmbedded(part: Part): part is EmbeddedSource {
  return part.kind === "EmbeddedSource";
}

/**
 * Strict alternation: fragment, embedded, fragment, ..., fragment.
 */
export function isAlternating(parts: PartSequence): boolean {
  if (parts.length % 2 === 0) return false;
  return parts.every((part, i) =>
    i % 2 === 0 ? part.kind === "LiteralFragment" : part.kind === "EmbeddedSource",
  );
}

/**
 * Concatenate fragment texts, substituting `placeholder` for every
 * embedded part.
 */
export function reconstruct(
  parts: PartSequence,
  placeholder: (embedded: EmbeddedSource) => string = () => "{}",
): string {
  return parts.map((p) => (p.kind === "LiteralFragment" ? p.text : placeholder(p))).join("");
}
