export type ConnectorErrorCode =
  | 'MALFORMED_IDENTIFIER'
  | 'UNKNOWN_VOLUME'
  | 'CROSS_VOLUME_OPERATION'
  | 'INVALID_ARGUMENTS'
  | 'UNKNOWN_COMMAND'
  | 'NO_COMMAND'
  | 'NODE_NOT_FOUND'
  | 'NODE_EXISTS'
  | 'NOT_A_DIRECTORY'
  | 'INVALID_PATH'
  | 'INVALID_NAME'
  | 'NOT_PERMITTED'
  | 'UNSUPPORTED_ARCHIVE'
  | 'NOT_SUPPORTED';

export class ConnectorError extends Error {
  public readonly code: ConnectorErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ConnectorErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConnectorError';
    this.code = code;
    this.details = details;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
