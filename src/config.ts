// src/config.ts — Config Resolver
// Precedence: defaults ← config file ← CLI args. Parsing problems become warnings.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import { DEFAULT_REDACT_PATTERNS } from "./redact.js";
import { parseAssignments, toValueRecord, loadValuesFile } from "./presets.js";
import type { ResolvedConfig, Warning } from "./types.js";

export const CONFIG_FILENAME = "cnfgen.config.json";
const PACKAGE_JSON_KEY = "cnfgen";

export type Command = "edit" | "generate" | "fields";
const COMMANDS: readonly Command[] = ["edit", "generate", "fields"];

export interface ParsedArgs {
  command: Command;
  /** Positional words that are not a known command. */
  extra: string[];
  output?: string;
  config?: string;
  values?: string;
  set: string[];
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
}

/** Shape accepted from cnfgen.config.json or the "cnfgen" key of package.json. */
export interface FileConfig {
  outputDir?: string;
  values?: Record<string, string>;
  redact?: string[];
  verbose?: boolean;
}

const DEFAULTS: ResolvedConfig = {
  outputDir: ".",
  values: {},
  redact: DEFAULT_REDACT_PATTERNS,
  verbose: false,
  quiet: false,
};

/**
 * Resolve config from CLI args, config file, and defaults.
 * Presets merge per tag: file values, then --values, then --set.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd);

  const values: Record<string, string> = {
    ...DEFAULTS.values,
    ...fileConfig?.values,
    ...(args.values ? loadValuesFile(resolve(cwd, args.values), warnings) : {}),
    ...parseAssignments(args.set, warnings),
  };

  return {
    outputDir: resolve(cwd, args.output ?? fileConfig?.outputDir ?? DEFAULTS.outputDir),
    values,
    redact: fileConfig?.redact ?? DEFAULTS.redact,
    verbose: args.verbose || (fileConfig?.verbose ?? DEFAULTS.verbose),
    quiet: args.quiet,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && PACKAGE_JSON_KEY in pkg) {
        return toFileConfig(Reflect.get(pkg, PACKAGE_JSON_KEY), `package.json#${PACKAGE_JSON_KEY}`, warnings);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "info", module: "config", message: `Ignoring unreadable package.json: ${msg}` });
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    return toFileConfig(JSON.parse(content), filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/** Keep only well-typed keys; anything else is reported and dropped. */
export function toFileConfig(raw: unknown, source: string, warnings: Warning[]): FileConfig | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    warnings.push({ level: "warn", module: "config", message: `${source}: expected a JSON object` });
    return null;
  }
  const config: FileConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "outputDir":
        if (typeof value === "string") config.outputDir = value;
        else warnings.push({ level: "warn", module: "config", message: `${source}: "outputDir" must be a string` });
        break;
      case "values":
        config.values = toValueRecord(value, `${source}: values`, warnings);
        break;
      case "redact":
        if (Array.isArray(value) && value.every((p): p is string => typeof p === "string")) config.redact = value;
        else warnings.push({ level: "warn", module: "config", message: `${source}: "redact" must be an array of strings` });
        break;
      case "verbose":
        if (typeof value === "boolean") config.verbose = value;
        else warnings.push({ level: "warn", module: "config", message: `${source}: "verbose" must be a boolean` });
        break;
      default:
        warnings.push({ level: "warn", module: "config", message: `${source}: unknown key "${key}" ignored` });
    }
  }
  return config;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { o: "output", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help"],
    string: ["output", "config", "values", "set"],
  });

  const positional = args._.map(String);
  const first = positional[0];
  const command = COMMANDS.find((c) => c === first);

  return {
    command: command ?? "edit",
    extra: command ? positional.slice(1) : positional,
    output: optionalString(args.output),
    config: optionalString(args.config),
    values: optionalString(args.values),
    set: stringList(args.set),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}

function optionalString(value: unknown): string | undefined {
  if (Array.isArray(value)) return optionalString(value[value.length - 1]);
  return typeof value === "string" && value !== "" ? value : undefined;
}

/** mri yields a string for one flag and an array for repeats. */
function stringList(value: unknown): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map(String).filter((s) => s !== "");
}
