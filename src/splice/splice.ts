import { quoteString } from "../lowering/escapes.js";
import type { EmbeddedForm, LoweredLiteral } from "../lowering/parts.js";
import { createHeader, isInterpolationHeader, renderHeader, type InterpolationHeader } from "./header.js";

export interface StringConstant {
  kind: "StringConstant";
  value: string;
}

export interface ExpressionArgument {
  kind: "ExpressionArgument";
  source: string;
  form: EmbeddedForm;
}

export type SplicedArgument = InterpolationHeader | StringConstant | ExpressionArgument;

export interface SpliceOptions {
  header?: boolean;
  /** Replacement source for embeds, keyed by their offset in the raw interior. */
  rewritten?: ReadonlyMap<number, string>;
}

/**
 * Flatten a lowered literal into the arguments that replace it in its
 * enclosing argument list.
 */
export function spliceArguments(lowered: LoweredLiteral, options: SpliceOptions = {}): SplicedArgument[] {
  const args: SplicedArgument[] = [];
  if (options.header) {
    args.push(createHeader(lowered));
  }
  for (const part of lowered.parts) {
    if (part.kind === "LiteralFragment") {
      args.push({ kind: "StringConstant", value: part.text });
    } else {
      args.push({
        kind: "ExpressionArgument",
        source: options.rewritten?.get(part.offset) ?? part.text,
        form: part.form,
      });
    }
  }
  return args;
}

export function renderArgument(arg: SplicedArgument, headerSymbol: string): string {
  if (isInterpolationHeader(arg)) {
    return renderHeader(arg, headerSymbol);
  }
  return arg.kind === "StringConstant" ? quoteString(arg.value) : arg.source;
}

export function renderArguments(args: readonly SplicedArgument[], headerSymbol: string): string {
  return args.map((arg) => renderArgument(arg, headerSymbol)).join(", ");
}
