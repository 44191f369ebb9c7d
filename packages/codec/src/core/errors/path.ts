export type PathSegment = string | number

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

/**
 * Renders a field path the way it would be written to reach the value in
 * JavaScript: `Records[0].s3.object.size`, `responseElements["x-amz-id-2"]`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = ""

  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`
    } else if (IDENTIFIER.test(segment)) {
      out += out === "" ? segment : `.${segment}`
    } else {
      out += `[${JSON.stringify(segment)}]`
    }
  }

  return out
}
