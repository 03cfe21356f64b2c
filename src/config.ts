import { readFile } from "node:fs/promises";
import path from "node:path";
import { conventionByName, type ConventionName } from "./lowering/convention.js";
import { NORMALIZATION_POLICIES, type NormalizationPolicy } from "./lowering/normalize.js";

export const CONFIG_FILE = "ilower.json";

export interface LowererConfig {
  convention: ConventionName;
  normalization: NormalizationPolicy;
  /** Prefix each lowered literal with a synthesized InterpolationHeader. */
  header: boolean;
  headerSymbol: string;
}

export const DEFAULT_CONFIG: LowererConfig = {
  convention: "dollar",
  normalization: "strict",
  header: true,
  headerSymbol: "InterpolationHeader",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNormalization(value: string): value is NormalizationPolicy {
  return NORMALIZATION_POLICIES.some((p) => p === value);
}

/**
 * Validate a partial configuration on top of `base`. `origin` names the
 * file (or flag set) in error messages.
 */
export function parseConfig(raw: unknown, origin: string, base: LowererConfig = DEFAULT_CONFIG): LowererConfig {
  if (!isRecord(raw)) {
    throw new Error(`${origin}: expected a JSON object`);
  }
  const config: LowererConfig = { ...base };

  if (raw.convention !== undefined) {
    const name = String(raw.convention).trim().toLowerCase();
    const convention = conventionByName(name);
    if (!convention) {
      throw new Error(`${origin}: convention must be 'dollar' or 'brace', got '${name}'`);
    }
    config.convention = convention.name;
  }

  if (raw.normalization !== undefined) {
    const policy = String(raw.normalization).trim().toLowerCase();
    if (!isNormalization(policy)) {
      throw new Error(`${origin}: normalization must be 'strict' or 'compact', got '${policy}'`);
    }
    config.normalization = policy;
  }

  if (raw.header !== undefined) {
    if (typeof raw.header !== "boolean") {
      throw new Error(`${origin}: header must be true or false`);
    }
    config.header = raw.header;
  }

  if (raw.headerSymbol !== undefined) {
    const symbol = String(raw.headerSymbol).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_.]*$/.test(symbol)) {
      throw new Error(`${origin}: headerSymbol must be a dotted identifier, got '${symbol}'`);
    }
    config.headerSymbol = symbol;
  }

  if (config.header && config.normalization === "compact") {
    throw new Error(`${origin}: header requires 'strict' normalization`);
  }

  return config;
}

/**
 * Load ilower.json from the directory of `sourceFile`. A missing file
 * yields the defaults.
 */
export async function loadConfig(sourceFile: string): Promise<LowererConfig> {
  const dir = path.dirname(path.resolve(sourceFile));
  const configPath = path.join(dir, CONFIG_FILE);
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return { ...DEFAULT_CONFIG };
    }
    throw e;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new Error(`${configPath}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  return parseConfig(raw, configPath);
}
