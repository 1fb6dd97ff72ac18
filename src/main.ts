import { log, setLogLevel } from '@shared/logger'
import { runCli } from './cli/commands'
import { confirm } from './cli/prompt'
import { createGitBackend } from './node/adapters/git'
import { loadConfiguration, loadEnvFile } from './node/config'
import { SearchAggregator } from './node/services/SearchAggregator'
import { describeError } from './node/shared/errors'
import { ConfigStore } from './node/store'

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  loadEnvFile()
  const config = loadConfiguration()
  setLogLevel(config.logLevel)

  const backend = createGitBackend({ type: config.backend })
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())

  return runCli(argv, {
    store: new ConfigStore({ cwd: config.configDir }),
    aggregator: new SearchAggregator({
      backend,
      defaults: { concurrency: config.concurrency, repoTimeoutMs: config.repoTimeoutMs }
    }),
    backend,
    out: (text) => console.log(text),
    confirm,
    engineOptions: { signal: controller.signal }
  })
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error(`grepo failed: ${describeError(error)}`)
    process.exitCode = 1
  })
