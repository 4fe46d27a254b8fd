export { CookieJar, type Cookie } from "./cookie-jar.js";
export {
  DEFAULT_DRIVE_BASE_URL,
  buildDownloadUrl,
  downloadDriveArchive,
  extractConfirmToken,
  fetchWithCookies
} from "./drive.js";
export {
  ExtractionError,
  FetchError,
  NetworkError,
  RelocationError,
  type FetchErrorKind
} from "./errors.js";
export { ensureMaterialized, materializeTarget } from "./materialize.js";
export { BUILTIN_TARGETS, DEFAULT_TARGET_NAME, listTargets, resolveTarget } from "./targets.js";
export type * from "./types.js";
export { parseFetchArgs, runFetchCli } from "./cli.js";
