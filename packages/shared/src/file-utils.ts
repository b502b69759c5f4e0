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

export function errorMessage(error:unknown):string {
  return error instanceof Error ? error.message : String(error);
}

export async function accessReadable(file:string):Promise<AccessResult> {
  try {
    await fs.access(file,F.R_OK);
    const stat = await fs.stat(file);
    if (!stat.isFile()) return { ok:false, error: reasonFromCode('EISDIR') };
    return { ok:true };
  } catch (error) {
      return { ok: false, error: reasonFromCode(extractErrorCode(error)) };
  }
}

export async function ensureDirectory(path:string):Promise<void> {
  await fs.mkdir(path, { recursive: true });
}
