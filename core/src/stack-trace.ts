/**
 * Stack trace capture for narrowpack errors
 *
 * Wraps `Error.captureStackTrace`, which only V8 engines (Node.js, Chrome)
 * provide, so error constructors can drop their own frames without casting
 * the Error constructor.
 */

/** Constructor reference passed to V8 to cut frames from the trace */
type ErrorConstructorRef = abstract new (...args: never[]) => Error;

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: ErrorConstructorRef): void;
}

function hasCaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8ErrorConstructor {
  return 'captureStackTrace' in errorConstructor && typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Capture a stack trace on `error`, omitting frames from `constructorOpt` upward.
 *
 * Outside V8 this does nothing; the Error constructor has already filled
 * in `stack`.
 *
 * @example
 * ```typescript
 * class FrameError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     captureStackTrace(this, FrameError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(error: Error, constructorOpt?: ErrorConstructorRef): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
