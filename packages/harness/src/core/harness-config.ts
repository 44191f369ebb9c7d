import path from "node:path"
import { delimitedList } from "@wirecodec/codec"
import { type EventFamily, eventFamilyNames } from "@wirecodec/events"
import { type LogLevelName, logLevelNames } from "@wirecodec/logger"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import { JsonSource } from "../adapters/json/json-source"
import type { ConfigSource } from "../ports/source"
import { loadConfig } from "./load-config"

export const DEFAULT_SAMPLES_DIR = "packages/events/src/__tests__/fixtures"
export const CONFIG_FILE = "wirecodec.json"

const familyList = delimitedList({ dropEmpty: true })

function splitFamilies(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined || Array.isArray(value)) return value

  const decoded = familyList.decode(value)
  return decoded.ok ? [...decoded.value] : [value]
}

const flag = z.union([z.boolean(), z.stringbool()])

export const harnessEnvSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("wirecodec-verify"),

  SAMPLES_DIR: z.string().min(1).default(DEFAULT_SAMPLES_DIR),
  FAMILIES: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform(splitFamilies)
    .pipe(z.array(z.enum(eventFamilyNames)).optional()),
  FAIL_FAST: flag.default(false),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type HarnessEnv = z.infer<typeof harnessEnvSchema>

export type HarnessConfig = {
  app: {
    env: string
  }

  samples: {
    /** Absolute directory holding `<family>.<name>.json` files. */
    dir: string

    /** Families to verify; all registered families when absent or empty. */
    families?: readonly EventFamily[]
  }

  verify: {
    failFast: boolean
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}

export function mapEnvToConfig(env: HarnessEnv, cwd: string): HarnessConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    samples: {
      dir: path.resolve(cwd, env.SAMPLES_DIR),
      ...(env.FAMILIES !== undefined && env.FAMILIES.length > 0 && { families: env.FAMILIES }),
    },
    verify: {
      failFast: env.FAIL_FAST,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Reads `wirecodec.json` (optional) and then `WIRECODEC_*` variables, which
 * take precedence.
 */
export async function loadHarnessConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<HarnessConfig> {
  const sources: ConfigSource[] = [
    new JsonSource({ file: CONFIG_FILE, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: harnessEnvSchema, sources })

  return mapEnvToConfig(result.value, cwd)
}
