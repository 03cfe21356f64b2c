import type { ConventionName } from "../lowering/convention.js";
import { quoteString } from "../lowering/escapes.js";
import type { EmbeddedForm, LoweredLiteral } from "../lowering/parts.js";
import type { UsageContext } from "../parser/context.js";

export type HeaderSegment =
  | { kind: "literal"; text: string }
  | { kind: "embedded"; text: string; form: EmbeddedForm };

/**
 * Compile-time metadata spliced ahead of a lowered literal's arguments.
 * It records the literal's shape so consumers can introspect it without
 * re-parsing, and is a distinct type so they can detect and skip it.
 */
export interface InterpolationHeader {
  kind: "InterpolationHeader";
  context: UsageContext;
  convention: ConventionName;
  segments: HeaderSegment[];
}

export function createHeader(lowered: LoweredLiteral): InterpolationHeader {
  return {
    kind: "InterpolationHeader",
    context: lowered.context,
    convention: lowered.convention,
    segments: lowered.parts.map((p): HeaderSegment =>
      p.kind === "LiteralFragment"
        ? { kind: "literal", text: p.text }
        : { kind: "embedded", text: p.text, form: p.form },
    ),
  };
}

export function isInterpolationHeader(value: unknown): value is InterpolationHeader {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "InterpolationHeader"
  );
}

/** Arguments with a leading header removed. */
export function withoutHeader<T>(args: readonly T[]): T[] {
  return args.filter((arg) => !isInterpolationHeader(arg));
}

// Even segment positions are literal text, odd ones embedded source.
export function renderHeader(header: InterpolationHeader, symbol: string): string {
  return `${symbol}!(${header.segments.map((s) => quoteString(s.text)).join(", ")})()`;
}
