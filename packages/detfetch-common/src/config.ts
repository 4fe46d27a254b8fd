import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";

/**
 * One archive to materialize: where it ends up, what it is called locally and
 * on Drive, and which folder its extraction is known to produce.
 */
export interface FetchTarget {
  /** Directory the extracted folder is moved into; relative to the working directory */
  destinationDirectory: string;
  archiveFileName: string;
  extractedFolderName: string;
  /** Google Drive file identifier */
  remoteResourceId: string;
}

export interface DetfetchConfig {
  /** Directory the archive is downloaded to and extracted in */
  workDir?: string;
  /** Drive download endpoint, e.g. https://docs.google.com/uc */
  baseUrl?: string;
  defaultTarget?: string;
  targets: Record<string, FetchTarget>;
}

export const DEFAULT_CONFIG_FILENAME = ".detfetch.json";

let cachedConfig: DetfetchConfig | null = null;
let cachedPath: string | null = null;

export class DetfetchConfigError extends Error {
  declare cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "DetfetchConfigError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function getDefaultConfigPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

export function resetConfigCache(): void {
  cachedConfig = null;
  cachedPath = null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Loads `.detfetch.json`. An explicit path (argument or DETFETCH_CONFIG) must
 * exist; a missing file at the default location yields an empty config so the
 * built-in targets still apply.
 */
export async function loadConfig(configPath?: string): Promise<DetfetchConfig> {
  const envConfigPath = process.env.DETFETCH_CONFIG;
  const explicitPath = configPath ?? (envConfigPath || undefined);
  const resolvedPath = path.resolve(explicitPath ?? getDefaultConfigPath());

  if (cachedConfig && cachedPath === resolvedPath) {
    return cachedConfig;
  }

  let fileContents: string;
  try {
    fileContents = await readFile(resolvedPath, "utf8");
  } catch (error) {
    if (explicitPath === undefined && isNotFound(error)) {
      return { targets: {} };
    }
    throw new DetfetchConfigError(
      `Unable to read detfetch config at ${resolvedPath}`,
      { cause: error }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(fileContents);
  } catch (error) {
    throw new DetfetchConfigError(
      `Invalid JSON in detfetch config at ${resolvedPath}`,
      { cause: error }
    );
  }

  const config = validateConfig(data, resolvedPath);
  cachedConfig = config;
  cachedPath = resolvedPath;
  return config;
}

export function validateConfig(value: unknown, configPath: string): DetfetchConfig {
  if (!isRecord(value)) {
    throw new DetfetchConfigError(
      `Config at ${configPath} must be a JSON object`
    );
  }
  const record = value;

  const optionalString = (key: string): string | undefined => {
    const raw = record[key];
    if (raw === undefined) {
      return undefined;
    }
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new DetfetchConfigError(
        `Config key "${key}" must be a non-empty string`
      );
    }
    return raw;
  };

  const workDir = optionalString("workDir");
  const baseUrl = optionalString("baseUrl");
  if (baseUrl !== undefined && !isAbsoluteUrl(baseUrl)) {
    throw new DetfetchConfigError(`Config key "baseUrl" must be an absolute URL`);
  }

  return {
    workDir: workDir === undefined ? undefined : path.normalize(workDir),
    baseUrl,
    defaultTarget: optionalString("defaultTarget"),
    targets: parseTargets(record.targets, configPath)
  };
}

function parseTargets(value: unknown, configPath: string): Record<string, FetchTarget> {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new DetfetchConfigError(
      `Config key "targets" must be an object in ${configPath}`
    );
  }

  // No prototype, so a "__proto__" entry is stored as an ordinary target.
  const targets: Record<string, FetchTarget> = Object.create(null);
  for (const [name, entry] of Object.entries(value)) {
    targets[name] = parseTarget(name, entry);
  }
  return targets;
}

function parseTarget(name: string, value: unknown): FetchTarget {
  if (!isRecord(value)) {
    throw new DetfetchConfigError(`Config key "targets.${name}" must be an object`);
  }
  const record = value;

  const requiredString = (key: keyof FetchTarget): string => {
    const raw = record[key];
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new DetfetchConfigError(
        `Config key "targets.${name}.${key}" must be a non-empty string`
      );
    }
    return raw;
  };

  const extractedFolderName = requiredString("extractedFolderName");
  if (extractedFolderName !== path.basename(extractedFolderName) || extractedFolderName === "..") {
    throw new DetfetchConfigError(
      `Config key "targets.${name}.extractedFolderName" must be a single folder name`
    );
  }

  const remoteResourceId = requiredString("remoteResourceId");
  if (!/^[A-Za-z0-9_-]+$/.test(remoteResourceId)) {
    throw new DetfetchConfigError(
      `Config key "targets.${name}.remoteResourceId" must contain only letters, digits, "-" and "_"`
    );
  }

  return {
    destinationDirectory: path.normalize(requiredString("destinationDirectory")),
    archiveFileName: path.normalize(requiredString("archiveFileName")),
    extractedFolderName,
    remoteResourceId
  };
}
