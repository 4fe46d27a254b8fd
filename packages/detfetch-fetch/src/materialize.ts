import { cp, rename, rm } from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import {
  createLogger,
  extractTarGzArchive,
  isDirectory,
  loadConfig,
  type FetchTarget
} from "@detfetch/common";

import { downloadDriveArchive } from "./drive.js";
import { ExtractionError, FetchError, NetworkError, RelocationError, describeError } from "./errors.js";
import { resolveTarget } from "./targets.js";
import type {
  MaterializeDependencies,
  MaterializeOptions,
  MaterializeResult,
  MaterializeTargetOptions,
  NamedMaterializeResult
} from "./types.js";

interface ResolvedDependencies {
  downloadArchive: NonNullable<MaterializeDependencies["downloadArchive"]>;
  extractArchive: NonNullable<MaterializeDependencies["extractArchive"]>;
}

function withDefaultDependencies(dependencies: MaterializeDependencies = {}): ResolvedDependencies {
  return {
    downloadArchive: dependencies.downloadArchive ?? downloadDriveArchive,
    extractArchive: dependencies.extractArchive ?? extractTarGzArchive
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

async function moveDirectory(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== "EXDEV") {
      throw error;
    }
    await cp(source, destination, { recursive: true, errorOnExist: true, force: false });
    await rm(source, { recursive: true, force: true });
  }
}

async function relocate(
  extractedPath: string,
  destinationDir: string,
  finalPath: string,
  folderName: string
): Promise<void> {
  if (!(await isDirectory(destinationDir))) {
    throw new RelocationError(`Destination directory ${destinationDir} does not exist`);
  }
  if (extractedPath === finalPath) {
    return;
  }
  try {
    await moveDirectory(extractedPath, finalPath);
  } catch (error) {
    throw new RelocationError(
      `Failed to move ${folderName} into ${destinationDir}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

/**
 * Makes sure `destinationDirectory/extractedFolderName` exists, downloading
 * and unpacking the target's archive only when it does not.
 *
 * Relative paths in the target resolve against `options.workDir`, which also
 * receives the archive and the freshly extracted folder before it is moved.
 * There is no lock: concurrent runs against the same paths race.
 */
export async function ensureMaterialized(
  target: Readonly<FetchTarget>,
  options: MaterializeOptions = {}
): Promise<MaterializeResult> {
  const logger = options.dependencies?.logger ?? createLogger("detfetch");
  const dependencies = withDefaultDependencies(options.dependencies);
  const workDir = path.resolve(options.workDir ?? process.cwd());
  const destinationDir = path.resolve(workDir, target.destinationDirectory);
  const finalPath = path.join(destinationDir, target.extractedFolderName);

  if (await isDirectory(finalPath)) {
    logger.info(`${target.extractedFolderName} already exists under ${target.destinationDirectory}.`);
    return { status: "already-present", target, path: finalPath };
  }

  logger.info("Connecting...");
  const archivePath = path.resolve(workDir, target.archiveFileName);
  try {
    await dependencies.downloadArchive(target.remoteResourceId, archivePath, {
      baseUrl: options.baseUrl,
      fetch: options.dependencies?.fetch,
      logger
    });
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    throw new NetworkError(`Failed to download ${target.archiveFileName}: ${describeError(error)}`, { cause: error });
  }

  try {
    logger.info("Extracting...");
    try {
      await dependencies.extractArchive(archivePath, workDir);
    } catch (error) {
      throw new ExtractionError(`Failed to extract ${target.archiveFileName}: ${describeError(error)}`, { cause: error });
    }

    const extractedPath = path.join(workDir, target.extractedFolderName);
    if (!(await isDirectory(extractedPath))) {
      throw new ExtractionError(
        `Archive ${target.archiveFileName} did not produce a folder named ${target.extractedFolderName}`
      );
    }

    logger.info("Relocating and cleaning up...");
    await relocate(extractedPath, destinationDir, finalPath, target.extractedFolderName);
  } finally {
    // Removed whatever the extraction or relocation outcome.
    await rm(archivePath, { force: true });
  }

  logger.info("Done.");
  return { status: "materialized", target, path: finalPath };
}

/**
 * Loads the config, picks the named (or default) target and materializes it.
 */
export async function materializeTarget(options: MaterializeTargetOptions = {}): Promise<NamedMaterializeResult> {
  const config = await loadConfig(options.configPath);
  const { name, target } = resolveTarget(config, options.targetName);
  const result = await ensureMaterialized(target, {
    workDir: options.workDir ?? config.workDir,
    baseUrl: config.baseUrl,
    dependencies: options.dependencies
  });
  return { name, ...result };
}
