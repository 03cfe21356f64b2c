#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { transform, type TransformResult } from "./transform.js";
import { formatDiagnostics, toJsonDiagnostic } from "./errors/reporter.js";
import { DEFAULT_CONFIG, loadConfig, parseConfig, type LowererConfig } from "./config.js";
import { lower } from "./lowering/lowerer.js";
import { CONVENTIONS, resolveConvention } from "./lowering/convention.js";
import { NORMALIZATION_POLICIES } from "./lowering/normalize.js";
import { USAGE_CONTEXTS, UsageContext } from "./parser/context.js";

const VERSION = "0.3.0";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".d"));
  if (found.length === 0) {
    throw new Error("No .d file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .d files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

// Command-line flags override ilower.json.
function applyFlags(config: LowererConfig, opts: Record<string, unknown>): LowererConfig {
  const overrides: Record<string, unknown> = {};
  if (opts.convention !== undefined) overrides.convention = opts.convention;
  if (opts.normalization !== undefined) overrides.normalization = opts.normalization;
  if (opts.header === false) overrides.header = false;
  if (opts.headerSymbol !== undefined) overrides.headerSymbol = opts.headerSymbol;
  if (overrides.normalization === "compact" && overrides.header === undefined) overrides.header = false;
  return parseConfig(overrides, "command line", config);
}

async function runTransform(file: string, opts: Record<string, unknown>): Promise<{ source: string; result: TransformResult }> {
  const config = applyFlags(await loadConfig(file), opts);
  const source = await readFile(file, "utf-8");
  const result = transform(source, file, {
    ...config,
    emitTokens: !!opts.emitTokens,
    emitParts: !!opts.emitParts,
  });
  return { source, result };
}

function reportVerbose(file: string, result: TransformResult): void {
  for (const lit of result.literals ?? []) {
    const { start } = lit.token.span;
    const embeds = lit.lowered.parts.filter(p => p.kind === "EmbeddedSource").length;
    console.error(chalk.dim(`${file}:${start.line}:${start.column} ${lit.lowered.context} (${lit.lowered.parts.length} parts, ${embeds} embedded)`));
  }
}

const program = new Command()
  .name("ilower")
  .description("Lower interpolated string literals (i\"...\") into argument lists")
  .version(VERSION);

program
  .command("lower [file]")
  .description("Rewrite interpolated literals in a .d file (defaults to the single .d file in the current directory)")
  .option("-o, --output <file>", "Write the rewritten source to a file instead of stdout")
  .option("--convention <name>", "Escape convention: dollar or brace")
  .option("--normalization <policy>", "Part normalization: strict or compact")
  .option("--no-header", "Do not prefix lowered literals with an InterpolationHeader")
  .option("--header-symbol <name>", "Symbol used to render the header")
  .option("--emit-tokens", "Print the token stream")
  .option("--emit-parts", "Print the lowered parts of every literal as JSON")
  .option("--verbose", "Print a summary line per literal to stderr")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const { source, result } = await runTransform(file, opts);

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(source, result.errors));
        process.exit(1);
      }
      if (result.warnings.length > 0) {
        console.error(formatDiagnostics(source, result.warnings));
      }
      if (opts.verbose) reportVerbose(file, result);

      if (opts.emitTokens && result.tokens) {
        for (const tok of result.tokens) {
          console.log(`${tok.kind}\t${JSON.stringify(tok.value)}\t${tok.span.start.line}:${tok.span.start.column}`);
        }
        return;
      }

      if (opts.emitParts && result.literals) {
        console.log(JSON.stringify(result.literals.map(lit => ({
          line: lit.token.span.start.line,
          column: lit.token.span.start.column,
          ...lit.lowered,
        })), null, 2));
        return;
      }

      if (result.output !== undefined) {
        if (opts.output) {
          const outputFile = String(opts.output);
          await writeFile(outputFile, result.output);
          console.log(`Lowered ${file} -> ${outputFile} (${result.literals?.length ?? 0} literals)`);
        } else {
          process.stdout.write(result.output);
        }
      }
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("check [file]")
  .description("Report diagnostics for interpolated literals without rewriting")
  .option("--convention <name>", "Escape convention: dollar or brace")
  .option("--json", "Output diagnostics as JSON for machine consumption")
  .action(async (file: string | undefined, opts: Record<string, unknown>) => {
    try {
      file = await resolveDefaultFile(file);
      const { source, result } = await runTransform(file, { ...opts, emitParts: true });
      const diagnostics = [...result.errors, ...result.warnings];

      if (opts.json) {
        console.log(JSON.stringify({
          file,
          literals: result.literals?.length ?? 0,
          diagnostics: diagnostics.map(toJsonDiagnostic),
        }, null, 2));
      } else if (diagnostics.length > 0) {
        console.error(formatDiagnostics(source, diagnostics));
      } else {
        console.log(`No problems found in ${file} (${result.literals?.length ?? 0} literals)`);
      }

      process.exit(result.errors.length > 0 ? 1 : 0);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("parts <text>")
  .description("Lower the interior of a single interpolated literal and print its parts as JSON")
  .option("--convention <name>", "Escape convention: dollar or brace")
  .option("--normalization <policy>", "Part normalization: strict or compact")
  .action((text: string, opts: Record<string, unknown>) => {
    try {
      const config = applyFlags({ ...DEFAULT_CONFIG, header: false }, opts);
      const result = lower(
        { text, start: { offset: 0, line: 1, column: 1 }, source: "<argument>" },
        UsageContext.CallArguments,
        { convention: resolveConvention(config.convention), normalization: config.normalization },
      );
      if (!result.ok) {
        console.error(`${chalk.red.bold("error")}[${result.error.code}]: ${result.error.message} at offset ${result.error.offset}`);
        process.exit(1);
      }
      console.log(JSON.stringify(result.value.parts, null, 2));
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("conventions")
  .description("Output escape conventions, normalization policies and usage contexts as JSON")
  .action(() => {
    console.log(JSON.stringify({
      version: VERSION,
      conventions: CONVENTIONS.map(c => ({
        name: c.name,
        introducer: c.introducer,
        group: `${c.groupOpen}${c.groupClose}`,
        identifierShorthand: c.identifierShorthand,
        description: c.description,
      })),
      normalization: NORMALIZATION_POLICIES,
      contexts: USAGE_CONTEXTS,
    }, null, 2));
  });

program.parse();
