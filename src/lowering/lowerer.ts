import {
  DOLLAR_CONVENTION,
  isIdentPart,
  isIdentStart,
  isSelfDelimiting,
  type EscapeConvention,
} from "./convention.js";
import { resolveEscape } from "./escapes.js";
import { normalize, type NormalizationPolicy } from "./normalize.js";
import {
  literalFragment,
  type EmbeddedForm,
  type InterpolatedLiteral,
  type LexError,
  type LowerResult,
  type Part,
} from "./parts.js";
import type { UsageContext } from "../parser/context.js";

export interface LowerOptions {
  convention?: EscapeConvention;
  normalization?: NormalizationPolicy;
  /** Resolve `\n`, `\"` and friends in literal text. */
  backslashEscapes?: boolean;
}

/**
 * Lower the raw interior of an interpolated literal into its part
 * sequence. The usage context is recorded on the result; checking it is
 * the caller's job.
 */
export function lower(
  raw: InterpolatedLiteral,
  context: UsageContext,
  options: LowerOptions = {},
): LowerResult {
  const convention = options.convention ?? DOLLAR_CONVENTION;
  const scanner = new InterpolationScanner(raw.text, convention, options.backslashEscapes ?? false);
  const { parts, error } = scanner.scan();
  if (error) {
    return { ok: false, error };
  }
  return {
    ok: true,
    value: {
      context,
      convention: convention.name,
      parts: normalize(parts, options.normalization ?? "strict"),
    },
  };
}

// Single left-to-right pass over the interior. Emits non-empty literal
// fragments and embedded captures; normalization adds the boundaries.
class InterpolationScanner {
  private text: string;
  private convention: EscapeConvention;
  private backslashEscapes: boolean;
  private pos: number = 0;
  private buffer: string = "";
  private bufferStart: number = 0;
  private parts: Part[] = [];

  constructor(text: string, convention: EscapeConvention, backslashEscapes: boolean) {
    this.text = text;
    this.convention = convention;
    this.backslashEscapes = backslashEscapes;
  }

  scan(): { parts: Part[]; error: LexError | null } {
    const { introducer, groupOpen, groupClose } = this.convention;
    const selfDelimiting = isSelfDelimiting(this.convention);

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      const next = this.pos + 1 < this.text.length ? this.text[this.pos + 1] : "";

      // Doubled introducer (and doubled close, when the introducer opens
      // the group itself) is literal text. A lone close is text too.
      if (ch === introducer && next === introducer) {
        this.append(ch, 2);
        continue;
      }
      if (selfDelimiting && ch === groupClose) {
        this.append(ch, next === groupClose ? 2 : 1);
        continue;
      }

      if (ch === introducer) {
        if (selfDelimiting) {
          const error = this.captureGroup(this.pos, this.pos);
          if (error) return { parts: this.parts, error };
          continue;
        }
        if (next === groupOpen) {
          const error = this.captureGroup(this.pos, this.pos + 1);
          if (error) return { parts: this.parts, error };
          continue;
        }
        if (this.convention.identifierShorthand && isIdentStart(next)) {
          this.captureIdentifier(this.pos);
          continue;
        }
        // Nothing valid follows: the introducer is plain text.
        this.append(ch, 1);
        continue;
      }

      if (this.backslashEscapes && ch === "\\" && next !== "") {
        this.append(resolveEscape(next), 2);
        continue;
      }

      this.append(ch, 1);
    }

    this.flush();
    return { parts: this.parts, error: null };
  }

  private append(text: string, width: number): void {
    if (this.buffer === "") this.bufferStart = this.pos;
    this.buffer += text;
    this.pos += width;
  }

  private flush(): void {
    if (this.buffer !== "") {
      this.parts.push(literalFragment(this.buffer, this.bufferStart));
      this.buffer = "";
    }
  }

  private captureIdentifier(start: number): void {
    const from = start + 1;
    let end = from;
    while (end < this.text.length && isIdentPart(this.text[end])) end++;
    this.emit(start, from, end, end, "identifier");
  }

  // `openAt` is the offset of the group's opening character.
  private captureGroup(start: number, openAt: number): LexError | null {
    const { groupOpen, groupClose } = this.convention;
    const open: number[] = [openAt];
    let i = openAt + 1;

    while (i < this.text.length) {
      const ch = this.text[i];
      if (ch === '"' || ch === "'") {
        const close = this.skipQuoted(i);
        if (close < 0) break;
        i = close + 1;
        continue;
      }
      if (ch === groupOpen) {
        open.push(i);
      } else if (ch === groupClose) {
        open.pop();
        if (open.length === 0) {
          this.emit(start, openAt + 1, i, i + 1, "expression");
          return null;
        }
      }
      i++;
    }

    const unmatched = open[open.length - 1] ?? openAt;
    return { code: "UnbalancedDelimiter", message: `Unclosed '${groupOpen}' in interpolated string`, offset: unmatched, delimiter: groupOpen };
  }

  // Returns the offset of the closing quote, or -1 when unterminated.
  private skipQuoted(at: number): number {
    const quote = this.text[at];
    let j = at + 1;
    while (j < this.text.length) {
      const ch = this.text[j];
      if (ch === "\\") {
        j += 2;
      } else if (ch === quote) {
        return j;
      } else {
        j++;
      }
    }
    return -1;
  }

  private emit(start: number, from: number, to: number, end: number, form: EmbeddedForm): void {
    this.flush();
    this.parts.push({
      kind: "EmbeddedSource",
      text: this.text.slice(from, to),
      form,
      offset: from,
      start,
      end,
    });
    this.pos = end;
  }
}
