import { ErrorCode, ErrorStage } from './types/enums.js';

export class FileTwinsError extends Error {
  constructor(message: string, readonly code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A stat or read failure on one specific path. Scanning records these and
 * moves on; fingerprinting lets them escape to the caller.
 */
export class AccessError extends FileTwinsError {
  constructor(
    readonly path: string,
    code: ErrorCode,
    readonly stage: ErrorStage,
    message: string,
    readonly osCode?: string,
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
  }
}

/** A supplied root is missing or is not a directory. */
export class NotFoundError extends FileTwinsError {
  constructor(readonly path: string, code: ErrorCode.NOT_FOUND | ErrorCode.NOT_A_DIRECTORY = ErrorCode.NOT_FOUND) {
    super(
      code === ErrorCode.NOT_FOUND ? `Directory does not exist: ${path}` : `Not a directory: ${path}`,
      code
    );
  }
}

export class ConfigError extends FileTwinsError {
  constructor(message: string, readonly source?: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.INVALID_CONFIG, options);
  }
}
