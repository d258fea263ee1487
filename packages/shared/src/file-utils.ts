import fs from "node:fs/promises";
import { constants as F } from 'node:fs';

export type AccessResult = | {ok:true} | {ok:false,error:string};

export function reasonFromCode(code:string | undefined) {
  const reason = code || 'UNKNOWN';
  const map:Record<string, string> = {
    EACCES: 'permission_denied',
    EPERM: 'operation_not_permitted',
    ENOENT: 'file_not_found',
    EISDIR: 'is_a_directory',
    ELOOP:  'symlink_loop',
    ENOTDIR:'not_a_directory'
  };
  return map[reason] || reason.toLowerCase();
}

export function extractErrorCode(error:unknown):string | undefined {
    if (typeof error === 'object'
      && error !== null && 'code' in error
      && typeof error.code === 'string'
    ) {
      return error.code;
    }
    return undefined;
}

export async function accessReadable(file:string):Promise<AccessResult> {
  try {
    await fs.access(file,F.R_OK);
    return { ok:true };
  } catch (error) {
      const code = extractErrorCode(error);
      return { ok: false, error: reasonFromCode(code) };
  }
}

/**
 * mkdir -p, returns the absolute directory path.
 */
export async function ensureDirectory(dir:string):Promise<string> {
  await fs.mkdir(dir, { recursive:true });
  return fs.realpath(dir);
}

export async function listFiles(path: string, extension?: string): Promise<string[]> {
  const dirents = await fs.readdir(path, { withFileTypes: true });
  return dirents
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name)
    .filter((name) => extension === undefined || name.endsWith(extension));
}
