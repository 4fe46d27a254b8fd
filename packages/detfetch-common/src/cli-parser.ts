import process from "node:process";

/**
 * Flag parsing for the detfetch commands. A command declares its flags once
 * as `ArgDef`s and gets parsing, help text and exit handling from them.
 */

export interface ArgDef {
  /** Long form, e.g. "--config" */
  name: string;
  /** Short form, e.g. "-t" */
  alias?: string;
  /** A "boolean" flag takes no value */
  type: "string" | "boolean";
  description: string;
}

export interface ParseResult<T> {
  options: T;
  errors: string[];
  helpRequested: boolean;
}

const HELP_FLAGS = new Set(["--help", "-h"]);

/** "--work-dir" becomes "workDir" */
function toOptionKey(flag: string): string {
  return flag.replace(/^-+/, "").replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function indexFlags(defs: ArgDef[]): Map<string, ArgDef> {
  const byFlag = new Map<string, ArgDef>();
  for (const def of defs) {
    byFlag.set(def.name, def);
    if (def.alias) {
      byFlag.set(def.alias, def);
    }
  }
  return byFlag;
}

/**
 * Parses `argv` (without the node and script entries). Unknown flags and bare
 * arguments are reported as errors; parsing stops at --help.
 */
export function parseArgs<T>(argv: string[], defs: ArgDef[]): ParseResult<T> {
  const byFlag = indexFlags(defs);
  const options: Record<string, string | boolean> = {};
  const errors: string[] = [];

  let index = 0;
  while (index < argv.length) {
    const token = argv[index];
    index += 1;

    if (HELP_FLAGS.has(token)) {
      return { options: options as T, errors, helpRequested: true };
    }

    const def = byFlag.get(token);
    if (def === undefined) {
      errors.push(token.startsWith("-") ? `Unknown option: ${token}` : `Unexpected argument: ${token}`);
      continue;
    }

    if (def.type === "boolean") {
      options[toOptionKey(def.name)] = true;
      continue;
    }

    const value = argv[index];
    if (value === undefined || value.startsWith("-")) {
      errors.push(`${def.name} requires a value`);
      continue;
    }
    options[toOptionKey(def.name)] = value;
    index += 1;
  }

  return { options: options as T, errors, helpRequested: false };
}

function flagLabel(def: ArgDef): string {
  const label = def.alias ? `${def.alias}, ${def.name}` : def.name;
  return def.type === "string" ? `${label} <value>` : label;
}

export function formatHelp(usage: string, description: string, defs: ArgDef[], examples: string[] = []): string {
  const rows: Array<[string, string]> = [
    ["--help, -h", "Show this message and exit"],
    ...defs.map((def): [string, string] => [flagLabel(def), def.description])
  ];
  const width = Math.max(...rows.map(([label]) => label.length));

  const lines = [`Usage: ${usage}`, "", description, "", "Options:"];
  for (const [label, text] of rows) {
    lines.push(`  ${label.padEnd(width)}  ${text}`);
  }
  if (examples.length > 0) {
    lines.push("", "Examples:", ...examples.map((example) => `  ${example}`));
  }
  lines.push("");
  return lines.join("\n");
}

/**
 * Writes help or parse errors. Returns the exit code to stop with, or
 * undefined when the command should run.
 */
export function handleParseResult<T>(
  result: ParseResult<T>,
  helpText: string,
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr
): number | undefined {
  if (result.helpRequested) {
    stdout.write(helpText);
    return result.errors.length > 0 ? 1 : 0;
  }
  if (result.errors.length === 0) {
    return undefined;
  }
  for (const error of result.errors) {
    stderr.write(`${error}\n`);
  }
  stderr.write("Use --help to list supported options.\n");
  return 1;
}
