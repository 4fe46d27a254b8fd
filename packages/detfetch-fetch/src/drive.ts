import { createWriteStream } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { once } from "node:events";
import path from "node:path";

import { createLogger, getTmpDir } from "@detfetch/common";

import { CookieJar } from "./cookie-jar.js";
import { NetworkError, describeError } from "./errors.js";
import type { DriveDownloadOptions, FetchLike } from "./types.js";

export const DEFAULT_DRIVE_BASE_URL = "https://docs.google.com/uc";

const CONFIRM_PATTERN = /confirm=([0-9A-Za-z_]+)/;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 10;
const COOKIE_FILENAME = "cookies.txt";

/**
 * Returns the first `confirm=<token>` value embedded in a Drive interstitial
 * page, or an empty string when the page carries none.
 */
export function extractConfirmToken(body: string): string {
  return CONFIRM_PATTERN.exec(body)?.[1] ?? "";
}

/**
 * `confirm` is only present when a token is passed, even an empty one, so the
 * first and second requests differ exactly by that parameter.
 */
export function buildDownloadUrl(baseUrl: string, resourceId: string, confirmToken?: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("export", "download");
  if (confirmToken !== undefined) {
    url.searchParams.set("confirm", confirmToken);
  }
  url.searchParams.set("id", resourceId);
  return url.toString();
}

/**
 * GETs `url`, following redirects by hand so that cookies set on every hop
 * land in the jar and are replayed on the next one.
 */
export async function fetchWithCookies(fetchImpl: FetchLike, url: string, jar: CookieJar): Promise<Response> {
  let current = new URL(url);

  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    const headers: Record<string, string> = {};
    const cookie = jar.cookieHeader(current);
    if (cookie) {
      headers.cookie = cookie;
    }

    let response: Response;
    try {
      response = await fetchImpl(current, { redirect: "manual", headers });
    } catch (error) {
      throw new NetworkError(`Failed to request ${current.toString()}: ${describeError(error)}`, { cause: error });
    }

    jar.storeResponseCookies(response, current);

    const location = response.headers.get("location");
    if (!REDIRECT_STATUSES.has(response.status) || location === null) {
      return response;
    }

    await response.body?.cancel();
    current = new URL(location, current);
  }

  throw new NetworkError(`Too many redirects requesting ${url}`);
}

function ensureOk(response: Response, url: string): void {
  if (!response.ok) {
    throw new NetworkError(`Failed to download ${url}: ${response.status} ${response.statusText}`);
  }
}

async function writeResponseToFile(response: Response, destination: string): Promise<void> {
  if (!response.body) {
    const arrayBuffer = await response.arrayBuffer();
    await writeFile(destination, Buffer.from(arrayBuffer));
    return;
  }

  const reader = response.body.getReader();
  const fileStream = createWriteStream(destination, { flags: "w" });

  await new Promise<void>((resolve, reject) => {
    fileStream.once("error", reject);
    fileStream.once("finish", resolve);

    const pump = async (): Promise<void> => {
      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) {
            break;
          }
          if (value) {
            if (!fileStream.write(Buffer.from(value))) {
              await once(fileStream, "drain");
            }
          }
        }
        fileStream.end();
      } catch (error) {
        fileStream.destroy(error instanceof Error ? error : new Error(String(error)));
        reject(error);
      }
    };

    void pump();
  });
}

/**
 * Downloads a Drive file to `destination` using the two-request confirmation
 * workaround: the first request collects cookies and the interstitial's
 * confirm token, the second replays both and streams the body to disk.
 *
 * The cookie jar lives in a private temp directory for the duration of the
 * two requests and is removed afterwards whether or not they succeeded.
 */
export async function downloadDriveArchive(
  resourceId: string,
  destination: string,
  options: DriveDownloadOptions = {}
): Promise<void> {
  const fetchImpl = options.fetch ?? fetch;
  const baseUrl = options.baseUrl ?? DEFAULT_DRIVE_BASE_URL;
  const logger = options.logger ?? createLogger("drive");

  const cookieDir = await mkdtemp(path.join(getTmpDir(), "detfetch-cookies-"));
  const cookiePath = path.join(cookieDir, COOKIE_FILENAME);

  try {
    const probeUrl = buildDownloadUrl(baseUrl, resourceId);
    const probeJar = new CookieJar();
    const probe = await fetchWithCookies(fetchImpl, probeUrl, probeJar);
    ensureOk(probe, probeUrl);
    const token = extractConfirmToken(await probe.text());
    await writeFile(cookiePath, probeJar.toNetscape(), "utf8");

    if (token === "") {
      logger.debug(`No confirmation token for ${resourceId}; requesting without one`);
    } else {
      logger.debug(`Confirmation token for ${resourceId}: ${token}`);
    }

    const downloadUrl = buildDownloadUrl(baseUrl, resourceId, token);
    const jar = CookieJar.fromNetscape(await readFile(cookiePath, "utf8"));
    const response = await fetchWithCookies(fetchImpl, downloadUrl, jar);
    ensureOk(response, downloadUrl);

    try {
      await writeResponseToFile(response, destination);
    } catch (error) {
      throw new NetworkError(`Failed to save ${downloadUrl} to ${destination}: ${describeError(error)}`, { cause: error });
    }
  } finally {
    await rm(cookieDir, { recursive: true, force: true });
  }
}
