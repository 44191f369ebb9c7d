import { readdirSync, readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { isWireObject, isWireValue, type WireObject, type WireValue } from "@wirecodec/codec"

export const fixturesDir = fileURLToPath(new URL("./fixtures", import.meta.url))

export function parseWire(text: string): WireValue {
  const parsed: unknown = JSON.parse(text)
  if (!isWireValue(parsed)) throw new TypeError("not a JSON document")

  return parsed
}

export function loadFixture(name: string): WireObject {
  const wire = parseWire(readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), "utf8"))
  if (!isWireObject(wire)) throw new TypeError(`fixture ${name} is not an object`)

  return wire
}

/**
 * Fixture `name` with `search` replaced in its compact JSON text.
 */
export function patchFixture(name: string, search: string, replacement: string): WireValue {
  const text = JSON.stringify(loadFixture(name))
  if (!text.includes(search)) throw new Error(`fixture ${name} does not contain ${search}`)

  return parseWire(text.replace(search, replacement))
}

export function fixtureNames(): string[] {
  return readdirSync(fixturesDir)
    .filter((file) => file.endsWith(".json"))
    .map((file) => file.slice(0, -".json".length))
    .sort()
}
