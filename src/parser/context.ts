import { TokenKind, type Token } from "../lexer/tokens.js";
import type { Diagnostic } from "../errors/diagnostic.js";
import { illegalContext, type IllegalReason } from "./errors.js";

/** Syntactic positions where an interpolated literal may appear. */
export enum UsageContext {
  CallArguments = "call-argument-list",
  ConstructorArguments = "constructor-argument-list",
  MixinArguments = "mixin-argument-list",
  TemplateArguments = "template-instantiation-argument-list",
  PragmaMessage = "pragma-message-argument-list",
  AssertArguments = "assert-argument-list",
}

export const USAGE_CONTEXTS: readonly UsageContext[] = Object.values(UsageContext);

export type LiteralSite =
  | { token: Token; context: UsageContext }
  | { token: Token; error: Diagnostic };

type GroupKind =
  | UsageContext
  | "group"
  | "index"
  | "block";

interface Group {
  kind: GroupKind;
  argIndex: number;
  /** First token inside the group; pragma needs to see `msg`. */
  first?: Token;
}

/**
 * Assigns a usage context to every interpolated literal in `tokens`, or
 * rejects it with an IllegalContext diagnostic.
 */
export function resolveContexts(tokens: Token[]): LiteralSite[] {
  return new ContextResolver(tokens).resolve();
}

class ContextResolver {
  private tokens: Token[];
  private stack: Group[] = [];
  private sites: LiteralSite[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  resolve(): LiteralSite[] {
    for (let i = 0; i < this.tokens.length; i++) {
      const tok = this.tokens[i];
      const top: Group | undefined = this.stack[this.stack.length - 1];
      if (top && top.first === undefined) top.first = tok;

      switch (tok.kind) {
        case TokenKind.LParen:
          this.stack.push({ kind: this.classifyParen(i), argIndex: 0 });
          break;
        case TokenKind.LBracket:
          this.stack.push({ kind: "index", argIndex: 0 });
          break;
        case TokenKind.LBrace:
          this.stack.push({ kind: "block", argIndex: 0 });
          break;
        case TokenKind.RParen:
        case TokenKind.RBracket:
        case TokenKind.RBrace:
          this.stack.pop();
          break;
        case TokenKind.Comma:
          if (top) top.argIndex++;
          break;
        case TokenKind.InterpolatedString:
          this.sites.push(this.checkSite(i, top));
          break;
      }
    }
    return this.sites;
  }

  private checkSite(i: number, group: Group | undefined): LiteralSite {
    const tok = this.tokens[i];
    if (!group) {
      const prev = this.tokens[i - 1];
      return { token: tok, error: illegalContext(tok, prev?.kind === TokenKind.Eq ? "binding" : "statement") };
    }
    if (group.kind === "group" || group.kind === "index" || group.kind === "block") {
      return { token: tok, error: illegalContext(tok, group.kind) };
    }

    const before = this.tokens[i - 1]?.kind;
    const after = this.tokens[i + 1]?.kind;
    const standalone =
      (before === TokenKind.LParen || before === TokenKind.Comma) &&
      (after === TokenKind.RParen || after === TokenKind.Comma);
    if (!standalone) {
      return { token: tok, error: illegalContext(tok, "operand") };
    }

    const reason = this.positionalReason(group.kind, group);
    if (reason) {
      return { token: tok, error: illegalContext(tok, reason) };
    }
    return { token: tok, context: group.kind };
  }

  private positionalReason(kind: UsageContext, group: Group): IllegalReason | null {
    if (kind === UsageContext.AssertArguments && group.argIndex === 0) {
      return "assert-condition";
    }
    if (kind === UsageContext.PragmaMessage) {
      const first = group.first;
      if (!first || first.kind !== TokenKind.Identifier || first.value !== "msg") {
        return "pragma-kind";
      }
      if (group.argIndex === 0) return "pragma-kind";
    }
    return null;
  }

  // `i` indexes an opening parenthesis.
  private classifyParen(i: number): GroupKind {
    const prev = this.tokens[i - 1];
    if (!prev) return "group";

    switch (prev.kind) {
      case TokenKind.Bang:
        // `Name!(` instantiates a template; any other `!(` negates a group.
        return this.isCallee(i - 2) ? UsageContext.TemplateArguments : "group";
      case TokenKind.Mixin:
        return UsageContext.MixinArguments;
      case TokenKind.Pragma:
        return UsageContext.PragmaMessage;
      case TokenKind.Assert:
        return UsageContext.AssertArguments;
      case TokenKind.RParen: {
        // cast(T)(…), if (…)(…)
        const open = this.matchingOpen(i - 1);
        if (open > 0 && this.tokens[open - 1].kind === TokenKind.Keyword) return "group";
        return this.isConstructorCall(i) ? UsageContext.ConstructorArguments : UsageContext.CallArguments;
      }
      case TokenKind.Identifier:
      case TokenKind.RBracket:
        return this.isConstructorCall(i) ? UsageContext.ConstructorArguments : UsageContext.CallArguments;
      default:
        return "group";
    }
  }

  private isCallee(j: number): boolean {
    if (j < 0) return false;
    const kind = this.tokens[j].kind;
    return kind === TokenKind.Identifier || kind === TokenKind.RParen || kind === TokenKind.RBracket;
  }

  // new Foo(…), new pkg.Foo(…), new Foo!(T)(…)
  private isConstructorCall(i: number): boolean {
    let j = i - 1;
    if (this.tokens[j].kind === TokenKind.RParen) {
      const open = this.matchingOpen(j);
      if (open < 1 || this.tokens[open - 1].kind !== TokenKind.Bang) return false;
      j = open - 2;
    }
    if (j < 0 || this.tokens[j].kind !== TokenKind.Identifier) return false;
    while (
      j >= 2 &&
      this.tokens[j - 1].kind === TokenKind.Dot &&
      this.tokens[j - 2].kind === TokenKind.Identifier
    ) {
      j -= 2;
    }
    return j >= 1 && this.tokens[j - 1].kind === TokenKind.New;
  }

  // Index of the '(' matching the ')' at `close`, or -1.
  private matchingOpen(close: number): number {
    let depth = 0;
    for (let k = close; k >= 0; k--) {
      const kind = this.tokens[k].kind;
      if (kind === TokenKind.RParen) depth++;
      else if (kind === TokenKind.LParen) {
        depth--;
        if (depth === 0) return k;
      }
    }
    return -1;
  }
}
