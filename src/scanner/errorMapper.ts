import { AccessError } from '../errors.js';
import { ErrorCode, ErrorStage } from '../types/enums.js';

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

function readErrorFields(err: unknown): { code?: string; message: string } {
  if (typeof err === 'object' && err !== null) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    const message = 'message' in err && typeof err.message === 'string' ? err.message : String(err);
    return { code, message };
  }
  return { message: String(err) };
}

export function mapFsError(err: unknown, stage: ErrorStage, path: string): AccessError {
  if (err instanceof AccessError) return err;
  const { code, message } = readErrorFields(err);
  let mapped: ErrorCode = ErrorCode.IO_ERROR;
  if (code) {
    if (PERMISSION_CODES.has(code)) mapped = ErrorCode.PERMISSION_DENIED;
    else if (MISSING_CODES.has(code)) mapped = ErrorCode.NOT_FOUND;
    else if (code === 'ENAMETOOLONG') mapped = ErrorCode.PATH_TOO_LONG;
  }
  return new AccessError(path, mapped, stage, message, code, { cause: err });
}
