import { loadConfig } from '@/lib/config'
import { runPipeline } from '@/lib/pipeline/run-pipeline'

async function main(): Promise<void> {
  const config = loadConfig()
  const summary = await runPipeline(config)

  if (summary.failedLookups > 0) {
    console.warn(`[venue-citations] ${summary.failedLookups} citation lookup(s) degraded to zero counts`)
  }
}

main().catch((error: unknown) => {
  console.error('[venue-citations] Run failed:', error)
  process.exitCode = 1
})
