export type Ok<T> = {
  readonly ok: true
  readonly value: T
}

export type Err<E> = {
  readonly ok: false
  readonly error: E
}

/**
 * Outcome of a decode. Failures are values, not exceptions: malformed
 * payloads are an expected condition for every codec.
 */
export type Result<T, E> = Ok<T> | Err<E>
