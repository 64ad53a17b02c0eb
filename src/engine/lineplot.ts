import { ViewError } from './errors'
import { SurveyNetwork } from './network'
import { parseShots } from './parse'
import { projectView } from './project'
import type { LinePlotConfig, LinePlotRun, ViewOutcome } from '../types'

/**
 * Parses a survey sheet, resolves it and projects each requested view.
 * Errors in the sheet or the network abort the run; a bad view name only
 * fails its own entry in `views`.
 */
export const runLinePlot = ({ input, views, ...opts }: LinePlotConfig): LinePlotRun => {
  const parsed = parseShots(input)
  const network = new SurveyNetwork(opts)
  network.logs.push(...parsed.logs)
  network.addShots(parsed.shots)
  const resolved = network.process()

  const outcomes = views.map((view): ViewOutcome => {
    try {
      return { view, ok: true, projection: projectView(resolved, view) }
    } catch (e) {
      if (!(e instanceof ViewError)) throw e
      network.logs.push(`View ${view} failed: ${e.message}`)
      return { view, ok: false, error: e }
    }
  })

  return { network: resolved, views: outcomes, warnings: network.warnings, logs: network.logs }
}
