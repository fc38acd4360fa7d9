export enum ErrorCode {
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  NOT_FOUND = 'NOT_FOUND',
  NOT_A_DIRECTORY = 'NOT_A_DIRECTORY',
  NOT_A_FILE = 'NOT_A_FILE',
  PATH_TOO_LONG = 'PATH_TOO_LONG',
  IO_ERROR = 'IO_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG'
}

export enum ErrorStage {
  STAT = 'STAT',
  LIST = 'LIST',
  READ = 'READ',
  EXECUTE = 'EXECUTE'
}
