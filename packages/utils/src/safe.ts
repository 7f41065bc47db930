export type SafePromise<T, E extends Error | string = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export type Safe<T, E extends Error | string = Error> =
  | SafeError<E>
  | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error | string> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

/**
 * Runs `promise` and captures a rejection as the first tuple element.
 * A rejection with no reason still counts as a failure.
 */
export async function safeTry<T>(promise: () => Promise<T>): SafePromise<T> {
  try {
    return safeResult(await promise())
  } catch (err) {
    return safeError(toError(err))
  }
}

function toError(err: unknown): Error {
  if (err instanceof Error) return err
  return new Error(err === undefined ? 'Rejected without a reason' : String(err))
}
