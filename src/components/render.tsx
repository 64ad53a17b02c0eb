import { renderToStaticMarkup } from 'react-dom/server'
import LinePlotView from './LinePlotView'
import ReportView from './ReportView'
import type { LinePlotRun, ViewProjection } from '../types'

export const renderViewSvg = (projection: ViewProjection, opts: { title: string; units: string }): string =>
  `<?xml version="1.0" encoding="UTF-8"?>\n${renderToStaticMarkup(
    <LinePlotView projection={projection} title={opts.title} units={opts.units} />,
  )}\n`

export const renderReportHtml = (run: LinePlotRun): string =>
  `<!DOCTYPE html>\n${renderToStaticMarkup(<ReportView run={run} />)}\n`
