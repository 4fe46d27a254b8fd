import type { DetfetchLogger, FetchTarget } from "@detfetch/common";

export type MaterializeStatus = "already-present" | "materialized";

export interface MaterializeResult {
  status: MaterializeStatus;
  target: Readonly<FetchTarget>;
  /** Absolute path of the extracted folder at its destination */
  path: string;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface DriveDownloadOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  logger?: DetfetchLogger;
}

export interface MaterializeDependencies {
  fetch?: FetchLike;
  downloadArchive?: (resourceId: string, destination: string, options: DriveDownloadOptions) => Promise<void>;
  extractArchive?: (archivePath: string, destination: string) => Promise<void>;
  logger?: DetfetchLogger;
}

export interface MaterializeOptions {
  /** Directory relative paths resolve against; defaults to process.cwd() */
  workDir?: string;
  baseUrl?: string;
  dependencies?: MaterializeDependencies;
}

export interface MaterializeTargetOptions {
  configPath?: string;
  targetName?: string;
  workDir?: string;
  dependencies?: MaterializeDependencies;
}

export interface NamedMaterializeResult extends MaterializeResult {
  name: string;
}
