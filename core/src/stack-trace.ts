/**
 * Stack trace capture
 *
 * Wraps V8's Error.captureStackTrace so error constructors can drop their own
 * frames without casting the Error constructor.
 */

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(
  errorConstructor: typeof Error
): errorConstructor is typeof Error & V8ErrorConstructor {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Capture a stack trace on `error`, omitting frames above `constructorOpt`.
 * No-op on engines without Error.captureStackTrace; the stack set by the
 * Error constructor is kept as is.
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
