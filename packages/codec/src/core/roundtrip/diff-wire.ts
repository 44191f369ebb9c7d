import { isWireArray, isWireObject, lookup, type WireInput } from "../../ports/wire-value"
import { formatPath, type PathSegment } from "../errors/path"

export type WireDifference = {
  /** Formatted path, `""` for the root. */
  readonly path: string
  readonly expected: WireInput
  readonly actual: WireInput
}

function walk(
  expected: WireInput,
  actual: WireInput,
  path: PathSegment[],
  out: WireDifference[],
): void {
  if (isWireObject(expected) && isWireObject(actual)) {
    const keys = new Set([...Object.keys(expected), ...Object.keys(actual)])
    for (const key of keys) {
      walk(lookup(expected, key), lookup(actual, key), [...path, key], out)
    }
    return
  }

  if (isWireArray(expected) && isWireArray(actual)) {
    const length = Math.max(expected.length, actual.length)
    for (let index = 0; index < length; index++) {
      walk(expected[index], actual[index], [...path, index], out)
    }
    return
  }

  if (!Object.is(expected, actual)) {
    out.push({ path: formatPath(path), expected, actual })
  }
}

/**
 * Structural differences between two wire values. Object key order is
 * ignored; array order is not. A key missing on one side shows up as
 * `undefined`.
 */
export function diffWire(expected: WireInput, actual: WireInput): WireDifference[] {
  const out: WireDifference[] = []
  walk(expected, actual, [], out)
  return out
}
