import { describe, expect, it } from "vitest";

import { FetchError } from "../src/errors.js";
import { BUILTIN_TARGETS, DEFAULT_TARGET_NAME, listTargets, resolveTarget } from "../src/targets.js";

const CUSTOM = {
  destinationDirectory: "data/detections",
  archiveFileName: "custom.tar.gz",
  extractedFolderName: "custom",
  remoteResourceId: "CUSTOM_ID"
};

describe("targets", () => {
  it("ships the test2015 fine-tuned detections as the default target", () => {
    expect(DEFAULT_TARGET_NAME).toBe("test2015_finetuned_vcl");
    expect(BUILTIN_TARGETS[DEFAULT_TARGET_NAME]).toEqual({
      destinationDirectory: "../hicodet/detections",
      archiveFileName: "test2015_finetuned_vcl.tar.gz",
      extractedFolderName: "test2015_finetuned_vcl",
      remoteResourceId: "1eMj8DON8NkutD6kWT_U-xiP4B5jsKXF6"
    });
    expect(Object.isFrozen(BUILTIN_TARGETS[DEFAULT_TARGET_NAME])).toBe(true);
  });

  it("overlays config targets on the built-ins", () => {
    const targets = listTargets({
      targets: {
        custom: CUSTOM,
        test2015_finetuned_vcl: { ...CUSTOM, destinationDirectory: "elsewhere" }
      }
    });

    expect(Object.keys(targets).sort()).toEqual(["custom", "test2015_finetuned_vcl"]);
    expect(targets.test2015_finetuned_vcl.destinationDirectory).toBe("elsewhere");
  });

  it("resolves the explicit name, then the config default, then the built-in default", () => {
    const config = { defaultTarget: "custom", targets: { custom: CUSTOM } };

    expect(resolveTarget(config, DEFAULT_TARGET_NAME).name).toBe(DEFAULT_TARGET_NAME);
    expect(resolveTarget(config)).toEqual({ name: "custom", target: CUSTOM });
    expect(resolveTarget({ targets: {} }).name).toBe(DEFAULT_TARGET_NAME);
  });

  it("reports unknown targets as config errors", () => {
    let caught: unknown;
    try {
      resolveTarget({ targets: { custom: CUSTOM } }, "nope");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FetchError);
    expect(caught).toHaveProperty("kind", "config");
    expect(caught).toHaveProperty("message", 'Unknown target "nope". Known targets: custom, test2015_finetuned_vcl');
  });

  it("does not resolve names inherited from Object.prototype", () => {
    for (const name of ["constructor", "toString", "__proto__"]) {
      expect(() => resolveTarget({ targets: {} }, name)).toThrow(
        `Unknown target "${name}". Known targets: test2015_finetuned_vcl`
      );
    }
  });

  it("resolves a configured target whose name shadows a prototype member", () => {
    const targets: Record<string, typeof CUSTOM> = JSON.parse(`{"__proto__":${JSON.stringify(CUSTOM)}}`);

    expect(resolveTarget({ targets }, "__proto__")).toEqual({ name: "__proto__", target: CUSTOM });
  });
});
