#!/usr/bin/env node
// CLI entry point for cnfgen

import { GENERATOR_VERSION, ShapeError } from "../types.js";
import type { ResolvedConfig, Warning } from "../types.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import type { ParsedArgs } from "../config.js";
import { FormSession } from "../session.js";
import { createPhoneSchema } from "../schema/phone-schema.js";
import { formatFieldList } from "../field-listing.js";
import { redactDocument } from "../redact.js";
import { renderXml } from "../xml.js";
import { TerminalForm } from "../terminal-ui.js";

const HELP_TEXT = `
cnfgen v${GENERATOR_VERSION}

Usage:
  cnfgen [edit]                Interactive form; press 's' to write SEP<MAC>.cnf.xml
  cnfgen generate              Build the file from presets without prompting
  cnfgen fields                List every field tag, label and option

Options:
  --output, -o <dir>   Destination directory (default: current directory)
  --config, -c <file>  Config file (default: ./cnfgen.config.json or "cnfgen" in package.json)
  --values <file>      JSON object of tag → value presets
  --set tag=value      Preset one field; repeatable. Dropdowns take a label or value
  --dry-run            Print the document (secrets masked) instead of writing it
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress details
  --help, -h           Show this help text

Examples:
  cnfgen
  cnfgen generate --set device=00:1a:2b:3c:4d:5e --set processNodeName1=10.0.0.5
  cnfgen generate --values phone-101.json --output ./tftp
  cnfgen generate --values phone-101.json --dry-run
`.trim();

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}\n`);
  }
}

async function main(): Promise<void> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(0);
  }

  const warnings: Warning[] = [];
  if (args.extra.length > 0) {
    warnings.push({ level: "warn", module: "cli", message: `Ignoring unexpected arguments: ${args.extra.join(" ")}` });
  }
  const config = resolveConfig(args, warnings);

  const session = new FormSession(createPhoneSchema());
  const applied = session.prefill(config.values, warnings);
  vlog(config.verbose, `Applied ${applied} preset value(s); ${session.visibleRows().length} rows visible`);

  printWarnings(warnings, config.quiet);

  switch (args.command) {
    case "fields":
      process.stdout.write(formatFieldList(session.registry));
      process.exit(0);
    case "generate":
      process.exit(runGenerate(session, config, args));
    case "edit":
      await runEdit(session, config);
      process.exit(0);
  }
}

function runGenerate(session: FormSession, config: ResolvedConfig, args: ParsedArgs): number {
  if (args.dryRun) {
    try {
      const doc = session.preview();
      process.stdout.write(renderXml(redactDocument(doc.root, config.redact)));
      vlog(config.verbose, `Would write ${doc.fileName} to ${config.outputDir}`);
      return 0;
    } catch (err: unknown) {
      if (!(err instanceof ShapeError)) throw err;
      process.stderr.write(`[error] ${err.message}\n`);
      return 1;
    }
  }

  const result = session.commit(config.outputDir);
  if (!result.ok) {
    process.stderr.write(`[error] ${result.message}\n`);
    return 1;
  }
  printWarnings(result.warnings, config.quiet);
  if (!config.quiet) process.stderr.write(`Written to ${result.path}\n`);
  return 0;
}

async function runEdit(session: FormSession, config: ResolvedConfig): Promise<void> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("The interactive form needs a terminal. Use `cnfgen generate` for scripted runs.");
  }
  vlog(config.verbose, `Files are written to ${config.outputDir}`);
  await new TerminalForm(session, {
    outputDir: config.outputDir,
    input: process.stdin,
    output: process.stdout,
  }).run();
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
