export type BridgeErrorKind =
  | 'ModuleNotFoundError'
  | 'ModuleLoadError'
  | 'FunctionNotFoundError'
  | 'ValidationError'
  | 'InvalidReturnType'
  | 'InvalidReturnFormat'
  | 'ActionRuntimeError'
  | 'ActionTimeout'
  | 'RequestDecodeError'
  | 'InvalidRequest'
  | 'UnsupportedRequestType'
  | 'RequestTooLarge'
  | 'RequestTimeout'
  | 'TransportTimeout'
  | 'TransportRefused'
  | 'TransportDecodeError'
  | 'TransportProtocolError'
  | 'TransportError';

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: BridgeErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BridgeError';
    this.kind = kind;
    this.details = details;
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  try {
    return String(error);
  } catch {
    // Objects without a prototype have no toString to call.
    return Object.prototype.toString.call(error);
  }
}

/** Class name of a thrown value, as reported in the `type` envelope field. */
export function getErrorTypeName(error: unknown): string {
  if (error instanceof Error) {
    const ctorName = error.constructor.name;
    return ctorName && ctorName !== 'Error' ? ctorName : error.name;
  }
  return 'ActionRuntimeError';
}
