export { reasonFromCode, extractErrorCode, accessReadable, ensureDirectory, listFiles } from "./file-utils.js";
export type { AccessResult } from "./file-utils.js";
