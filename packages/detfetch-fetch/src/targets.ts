import type { DetfetchConfig, FetchTarget } from "@detfetch/common";

import { FetchError } from "./errors.js";

export const DEFAULT_TARGET_NAME = "test2015_finetuned_vcl";

/** Fine-tuned VCL detections on the HICO-DET test2015 split. */
export const BUILTIN_TARGETS: Readonly<Record<string, Readonly<FetchTarget>>> = Object.freeze({
  test2015_finetuned_vcl: Object.freeze({
    destinationDirectory: "../hicodet/detections",
    archiveFileName: "test2015_finetuned_vcl.tar.gz",
    extractedFolderName: "test2015_finetuned_vcl",
    remoteResourceId: "1eMj8DON8NkutD6kWT_U-xiP4B5jsKXF6"
  })
});

/** Built-in targets overlaid with those from the config file. */
export function listTargets(config: DetfetchConfig): Record<string, Readonly<FetchTarget>> {
  return { ...BUILTIN_TARGETS, ...config.targets };
}

export function resolveTarget(
  config: DetfetchConfig,
  name?: string
): { name: string; target: Readonly<FetchTarget> } {
  const targets = listTargets(config);
  const selected = name ?? config.defaultTarget ?? DEFAULT_TARGET_NAME;
  if (!Object.hasOwn(targets, selected)) {
    throw new FetchError(
      "config",
      `Unknown target "${selected}". Known targets: ${Object.keys(targets).sort().join(", ")}`
    );
  }
  return { name: selected, target: targets[selected] };
}
