export type ConventionName = "dollar" | "brace";

/**
 * How an interpolated literal marks embedded source.
 *
 * When `introducer` equals `groupOpen` the introducer opens the capture
 * itself (`{expr}`), and a lone `groupClose` in literal text must be
 * doubled to be taken literally.
 */
export interface EscapeConvention {
  name: ConventionName;
  introducer: string;
  groupOpen: string;
  groupClose: string;
  /** Whether `$name` captures an identifier without grouping. */
  identifierShorthand: boolean;
  description: string;
}

export const DOLLAR_CONVENTION: EscapeConvention = {
  name: "dollar",
  introducer: "$",
  groupOpen: "(",
  groupClose: ")",
  identifierShorthand: true,
  description: "$name or $(expr) embeds source; $$ is a literal $",
};

export const BRACE_CONVENTION: EscapeConvention = {
  name: "brace",
  introducer: "{",
  groupOpen: "{",
  groupClose: "}",
  identifierShorthand: false,
  description: "{expr} embeds source; {{ and }} are literal braces",
};

export const CONVENTIONS: readonly EscapeConvention[] = [DOLLAR_CONVENTION, BRACE_CONVENTION];

export function conventionByName(name: string): EscapeConvention | undefined {
  return CONVENTIONS.find((c) => c.name === name);
}

export function isSelfDelimiting(convention: EscapeConvention): boolean {
  return convention.introducer === convention.groupOpen;
}

export function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

export function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || (ch >= "0" && ch <= "9");
}

export function resolveConvention(name: ConventionName): EscapeConvention {
  return name === "brace" ? BRACE_CONVENTION : DOLLAR_CONVENTION;
}
