import process from "node:process";

import {
  formatHelp,
  handleParseResult,
  loadConfig,
  parseArgs,
  type ArgDef
} from "@detfetch/common";

import { describeError } from "./errors.js";
import { materializeTarget } from "./materialize.js";
import { DEFAULT_TARGET_NAME, listTargets } from "./targets.js";

export interface FetchCliOptions {
  config?: string;
  target?: string;
  workDir?: string;
  list?: boolean;
}

const ARG_DEFS: ArgDef[] = [
  {
    name: "--config",
    type: "string",
    description: "Load an alternate .detfetch.json file"
  },
  {
    name: "--target",
    alias: "-t",
    type: "string",
    description: `Archive to materialize (default: config defaultTarget or ${DEFAULT_TARGET_NAME})`
  },
  {
    name: "--work-dir",
    type: "string",
    description: "Directory to download and extract in (default: current directory)"
  },
  {
    name: "--list",
    type: "boolean",
    description: "List known targets and exit"
  }
];

const HELP_TEXT = formatHelp(
  "detfetch [options]",
  "Download and unpack a detection archive from Google Drive unless its\nfolder already exists at the destination.",
  ARG_DEFS,
  ["detfetch", "detfetch --target test2015_finetuned_vcl --work-dir ./download"]
);

export function parseFetchArgs(argv: string[]) {
  return parseArgs<FetchCliOptions>(argv, ARG_DEFS);
}

async function printTargets(configPath: string | undefined): Promise<void> {
  const config = await loadConfig(configPath);
  const targets = listTargets(config);
  const lines = Object.keys(targets)
    .sort()
    .map((name) => {
      const target = targets[name];
      return `${name}\t${target.destinationDirectory}/${target.extractedFolderName}\t${target.remoteResourceId}`;
    });
  process.stdout.write(`${lines.join("\n")}\n`);
}

export async function runFetchCli(
  argv: string[],
  runner: typeof materializeTarget = materializeTarget
): Promise<number> {
  const result = parseFetchArgs(argv);

  const exitCode = handleParseResult(result, HELP_TEXT);
  if (exitCode !== undefined) {
    return exitCode;
  }

  const { options } = result;

  try {
    if (options.list) {
      await printTargets(options.config);
      return 0;
    }

    const outcome = await runner({
      configPath: options.config,
      targetName: options.target,
      workDir: options.workDir
    });

    const summary = outcome.status === "already-present"
      ? `${outcome.name}: already present at ${outcome.path}`
      : `${outcome.name}: materialized at ${outcome.path}`;
    process.stdout.write(`${summary}\n`);
    return 0;
  } catch (error) {
    process.stderr.write(`Fetch failed: ${describeError(error)}\n`);
    return 1;
  }
}
