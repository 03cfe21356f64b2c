import { literalFragment, type Part, type PartSequence } from "./parts.js";

/**
 * `strict`: fragment/embedded/.../fragment, empty fragments inserted at
 * the ends and between adjacent embeds.
 * `compact`: empty fragments dropped.
 */
export type NormalizationPolicy = "strict" | "compact";

export const NORMALIZATION_POLICIES: readonly NormalizationPolicy[] = ["strict", "compact"];

export function normalize(parts: PartSequence, policy: NormalizationPolicy): PartSequence {
  return policy === "strict" ? normalizeStrict(parts) : normalizeCompact(parts);
}

function normalizeStrict(parts: PartSequence): PartSequence {
  const out: Part[] = [];
  for (const part of parts) {
    const last = out[out.length - 1];
    if (part.kind === "EmbeddedSource" && (last === undefined || last.kind === "EmbeddedSource")) {
      out.push(literalFragment("", part.start));
    }
    out.push(part);
  }
  const last = out[out.length - 1];
  if (last === undefined) {
    out.push(literalFragment("", 0));
  } else if (last.kind === "EmbeddedSource") {
    out.push(literalFragment("", last.end));
  }
  return out;
}

function normalizeCompact(parts: PartSequence): PartSequence {
  const out = parts.filter((p) => p.kind === "EmbeddedSource" || p.text !== "");
  // An interpolated literal never disappears from its argument list.
  if (out.length === 0) return [literalFragment("", 0)];
  return out;
}
