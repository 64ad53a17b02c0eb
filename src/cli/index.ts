import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { basename, extname, join } from 'node:path'
import { renderReportHtml, renderViewSvg } from '../components/render'
import { runLinePlot } from '../engine/lineplot'
import { parseArgs, toConfig } from './args'

async function main() {
  const args = parseArgs(process.argv.slice(2))
  const [path, ...ignored] = args.files

  if (!path) {
    console.error(
      'Usage: tsx src/cli/index.ts <survey.csv> [--plan] [--profile] [--flat] [--3d] [--report] [--out <dir>] [--title <name>] [--units <label>] [--tolerance <deg>]',
    )
    process.exit(1)
  }
  if (ignored.length) console.log(`Only ${path} is plotted; ignoring ${ignored.join(', ')}`)

  const config = toConfig(args, await readFile(path, 'utf8'))
  const run = runLinePlot(config)
  run.logs.forEach((line) => console.log(line))
  run.warnings.forEach((w) =>
    console.warn(`WARNING: ${w.field} ${w.fore}/${w.back} in shot ${w.shot} is off by ${w.difference.toFixed(2)}`),
  )

  const outDir = args.values.out ?? '.'
  const stem = basename(path, extname(path))
  await mkdir(outDir, { recursive: true })

  for (const outcome of run.views) {
    if (!outcome.ok) {
      console.error(outcome.error.message)
      continue
    }
    const outPath = join(outDir, `${stem}-${outcome.view}.svg`)
    const svg = renderViewSvg(outcome.projection, { title: run.network.title, units: run.network.distanceUnits })
    await writeFile(outPath, svg, 'utf8')
    console.log(`Wrote ${outPath}`)
  }

  if (args.flags.has('report')) {
    const outPath = join(outDir, `${stem}-report.html`)
    await writeFile(outPath, renderReportHtml(run), 'utf8')
    console.log(`Wrote ${outPath}`)
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err)
  process.exit(1)
})
