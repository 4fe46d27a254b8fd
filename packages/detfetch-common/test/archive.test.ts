import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { gzipSync } from "node:zlib";

import { __setSevenZipLoaderForTest, extractTarGzArchive } from "../src/archive.js";

type Callback = (error?: Error | null) => void;

const TEMP_PREFIX = path.join(os.tmpdir(), "detfetch-archive-");

function tarHeader(name: string, size: number, typeflag: "0" | "5"): Buffer {
  const header = Buffer.alloc(512);
  header.write(name, 0, 100, "utf8");
  header.write(typeflag === "5" ? "0000755\0" : "0000644\0", 100, 8, "ascii");
  header.write("0000000\0", 108, 8, "ascii");
  header.write("0000000\0", 116, 8, "ascii");
  header.write(`${size.toString(8).padStart(11, "0")}\0`, 124, 12, "ascii");
  header.write("00000000000\0", 136, 12, "ascii");
  header.write("        ", 148, 8, "ascii");
  header.write(typeflag, 156, 1, "ascii");
  header.write("ustar\0", 257, 6, "ascii");
  header.write("00", 263, 2, "ascii");
  let checksum = 0;
  for (const byte of header) {
    checksum += byte;
  }
  header.write(`${checksum.toString(8).padStart(6, "0")}\0 `, 148, 8, "ascii");
  return header;
}

/** One directory holding one text file, as a gzip-compressed ustar archive. */
function buildTarGz(folder: string, fileName: string, contents: string): Buffer {
  const body = Buffer.from(contents, "utf8");
  const padding = Buffer.alloc((512 - (body.length % 512)) % 512);
  return gzipSync(
    Buffer.concat([
      tarHeader(`${folder}/`, 0, "5"),
      tarHeader(`${folder}/${fileName}`, body.length, "0"),
      body,
      padding,
      Buffer.alloc(1024)
    ])
  );
}

describe("extractTarGzArchive", () => {
  let tempDir: string;
  const unpackMock = vi.fn<(source: string, destination: string) => Promise<void>>();

  beforeEach(async () => {
    tempDir = await mkdtemp(TEMP_PREFIX);
    process.env.DETFETCH_TMPDIR = tempDir;
    unpackMock.mockReset();
    __setSevenZipLoaderForTest(async () => ({
      unpack: (source: string, destination: string, callback: Callback) => {
        unpackMock(source, destination).then(() => callback(), (error: Error) => callback(error));
      }
    }));
  });

  afterEach(async () => {
    __setSevenZipLoaderForTest();
    delete process.env.DETFETCH_TMPDIR;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("unpacks the gzip layer then the tar layer", async () => {
    const destination = path.join(tempDir, "out");
    let staging = "";
    unpackMock.mockImplementationOnce(async (_source, stagingDir) => {
      staging = stagingDir;
      await writeFile(path.join(stagingDir, "sample.tar"), "tar-bytes", "utf8");
    });
    unpackMock.mockImplementationOnce(async () => {});

    await extractTarGzArchive("/data/sample.tar.gz", destination);

    expect(unpackMock).toHaveBeenCalledTimes(2);
    expect(unpackMock.mock.calls[0]).toEqual(["/data/sample.tar.gz", staging]);
    expect(path.dirname(staging)).toBe(tempDir);
    expect(path.basename(staging).startsWith("detfetch-extract-")).toBe(true);
    expect(unpackMock.mock.calls[1]).toEqual([path.join(staging, "sample.tar"), destination]);
    expect(await readdir(tempDir)).toEqual(["out"]);
  });

  it("wraps 7-Zip errors with the archive name", async () => {
    unpackMock.mockRejectedValueOnce(new Error("corrupted archive"));

    const error = await extractTarGzArchive("/data/broken.tar.gz", path.join(tempDir, "out")).catch(
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(Error);
    expect(error).toHaveProperty(
      "message",
      expect.stringContaining("7zip-min failed to extract archive broken.tar.gz")
    );
    expect(error).toHaveProperty("message", expect.stringContaining("Error: corrupted archive"));
    expect(await readdir(tempDir)).toEqual(["out"]);
  });

  it("fails when decompression yields nothing", async () => {
    unpackMock.mockResolvedValueOnce(undefined);

    await expect(extractTarGzArchive("/data/empty.tar.gz", path.join(tempDir, "out"))).rejects.toThrow(
      "Archive empty.tar.gz decompressed to nothing"
    );
    expect(unpackMock).toHaveBeenCalledTimes(1);
  });
});

describe("extractTarGzArchive with 7-Zip", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(TEMP_PREFIX);
    process.env.DETFETCH_TMPDIR = tempDir;
    __setSevenZipLoaderForTest();
  });

  afterEach(async () => {
    delete process.env.DETFETCH_TMPDIR;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("unpacks a real tar.gz into the destination", async () => {
    const archivePath = path.join(tempDir, "sample.tar.gz");
    await writeFile(archivePath, buildTarGz("sample_detections", "scores.txt", "0.91 0.42\n"));
    const destination = path.join(tempDir, "out");

    await extractTarGzArchive(archivePath, destination);

    expect(await readdir(destination)).toEqual(["sample_detections"]);
    expect(await readFile(path.join(destination, "sample_detections", "scores.txt"), "utf8")).toBe("0.91 0.42\n");
    expect((await readdir(tempDir)).sort()).toEqual(["out", "sample.tar.gz"]);
  }, 30_000);

  it("rejects a file that is not an archive", async () => {
    const archivePath = path.join(tempDir, "broken.tar.gz");
    await writeFile(archivePath, "not a gzip stream", "utf8");

    await expect(extractTarGzArchive(archivePath, path.join(tempDir, "out"))).rejects.toThrow(
      "7zip-min failed to extract archive broken.tar.gz"
    );
  }, 30_000);
});
