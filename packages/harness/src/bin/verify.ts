import { serializeError, toAppError } from "@wirecodec/errors"
import { PinoLogger } from "@wirecodec/logger"
import { loadHarnessConfig } from "../core/harness-config"
import { loadSamples } from "../core/load-samples"
import { verifySamples } from "../core/verify-samples"

/**
 * Verifies every configured sample and resolves to the process exit code.
 */
export async function run(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<number> {
  const config = await loadHarnessConfig(env, cwd)

  const logger = new PinoLogger(
    {},
    { level: config.logging.level, prettify: config.logging.prettify },
    { service: config.logging.serviceName, env: config.app.env, module: "verify" },
  )

  const { samples, skipped } = await loadSamples(config.samples.dir, {
    ...(config.samples.families && { families: config.samples.families }),
  })

  for (const { file, reason } of skipped) {
    logger.debug("sample skipped", { sample: file, reason })
  }

  if (samples.length === 0) {
    logger.warn("no samples to verify", { samplesDir: config.samples.dir })
  }

  const result = verifySamples({ logger }, samples, { failFast: config.verify.failFast })

  return result.failed === 0 && samples.length > 0 ? 0 : 1
}

if (import.meta.url === `file://${process.argv[1]}`) {
  run()
    .then((code) => {
      process.exitCode = code
    })
    .catch((err: unknown) => {
      console.error(JSON.stringify(serializeError(toAppError(err, "verify_failed"))))
      process.exitCode = 1
    })
}
