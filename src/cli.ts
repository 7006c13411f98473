#!/usr/bin/env node
/**
 * insight-report <file.csv> [--out report.pdf] [--backend none|local|remote]
 *
 * Loads a CSV file, runs the insights pipeline, prints the narrative sections and
 * writes the PDF report.
 */

import { readFile } from 'fs/promises'
import path from 'path'
import { parseArgs } from 'util'
import dotenv from 'dotenv'
import { loadConfig } from './config'
import { createBackend } from './lib/createBackend'
import { parseCSV } from './lib/csvParse'
import { ConfigurationError } from './lib/errors'
import { createInsightsPipeline } from './lib/insightsPipeline'
import { writeReport } from './lib/reportRenderer'

const USAGE = 'Usage: insight-report <file.csv> [--out report.pdf] [--backend none|local|remote]'

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      backend: { type: 'string', short: 'b' },
      help: { type: 'boolean', short: 'h' },
    },
  })
  const input = positionals[0]
  if (values.help || !input) {
    console.log(USAGE)
    return values.help ? 0 : 1
  }

  const config = loadConfig(process.env, { backend: values.backend })
  const backend = await createBackend(config.backend)
  const pipeline = createInsightsPipeline({ backend })

  const dataset = parseCSV(await readFile(input, 'utf-8'))
  const run = await pipeline.run(dataset)

  for (const section of run.sections) {
    console.log(`\n${section.title}\n${section.body}`)
  }

  const outPath = values.out ?? `${path.basename(input, path.extname(input))}_report.pdf`
  await writeReport(outPath, await pipeline.exportPdf(run))
  console.log(`\nReport written to ${outPath}`)
  return 0
}

if (require.main === module) {
  dotenv.config()
  main().then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      const msg = e instanceof Error ? e.message : String(e)
      console.error(e instanceof ConfigurationError ? `Configuration error: ${msg}` : `Error: ${msg}`)
      process.exitCode = 1
    }
  )
}
