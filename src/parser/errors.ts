import type { Diagnostic } from "../errors/diagnostic.js";
import { error } from "../errors/diagnostic.js";
import type { Token } from "../lexer/tokens.js";

export type IllegalReason =
  | "binding"
  | "statement"
  | "group"
  | "index"
  | "block"
  | "operand"
  | "assert-condition"
  | "pragma-kind";

const MESSAGE = "Interpolated string literal is not allowed here";

export function illegalContext(token: Token, reason: IllegalReason): Diagnostic {
  return error(MESSAGE, token.span, illegalContextHelp(reason), "IllegalContext");
}

export function illegalContextHelp(reason: IllegalReason): string {
  switch (reason) {
    case "binding":
      return "Interpolated literals cannot be bound to a variable; pass the literal directly as a function argument";
    case "statement":
      return "Interpolated literals only appear inside argument lists: calls, constructors, mixin, template instantiations, pragma(msg) and assert";
    case "group":
      return "A parenthesized expression is not an argument list; pass the literal directly to a call";
    case "index":
      return "Interpolated literals cannot appear inside array literals or index expressions";
    case "block":
      return "Interpolated literals cannot appear in a block or aggregate initializer";
    case "operand":
      return "An interpolated literal must be a complete argument, not an operand of a larger expression";
    case "assert-condition":
      return "Only assert's message arguments (second onward) may be interpolated";
    case "pragma-kind":
      return "Only pragma(msg, ...) accepts interpolated literals, after the 'msg' argument";
  }
}
