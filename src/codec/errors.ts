export const DirectErrorCode = {
  /** Body unreadable, not JSON, or not a Direct envelope */
  MALFORMED_MESSAGE: 'MalformedMessage',
  /** `data` does not match the positional-array shape or the target schema */
  PARAMS: 'ParamsError',
  /** The invoked handler failed */
  DISPATCH: 'DispatchError',
} as const;

export type DirectErrorCode = (typeof DirectErrorCode)[keyof typeof DirectErrorCode];

export class DirectCodecError extends Error {
  readonly code: DirectErrorCode;

  constructor(code: DirectErrorCode, message: string) {
    super(message);
    this.name = 'DirectCodecError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static malformed(detail: string): DirectCodecError {
    return new DirectCodecError(DirectErrorCode.MALFORMED_MESSAGE, `rpc: malformed request: ${detail}`);
  }

  static params(detail: string): DirectCodecError {
    return new DirectCodecError(DirectErrorCode.PARAMS, `rpc: method request ill-formed: ${detail}`);
  }
}

/**
 * Handler failure relayed to the client in an exception response.
 * Only the message text crosses the wire.
 */
export class DispatchError extends DirectCodecError {
  constructor(message: string) {
    super(DirectErrorCode.DISPATCH, message);
    this.name = 'DispatchError';
  }

  static fromError(err: unknown): DispatchError {
    if (err instanceof DispatchError) {
      return err;
    }
    if (err instanceof Error) {
      return new DispatchError(err.message || err.name);
    }
    return new DispatchError(String(err));
  }
}
