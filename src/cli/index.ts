import { logError } from '../lib/errorUtils'
import { runCli } from './run'

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2))
}

main().catch((err: unknown) => {
  logError('CLI', err)
  process.exit(1)
})
