import { describe, expect, it } from 'vitest'
import { readFileSync } from 'node:fs'
import { runLinePlot } from '../src/engine/lineplot'
import { ParseError, ValidationError, ViewError } from '../src/engine/errors'

const simple = readFileSync('tests/fixtures/simple.csv', 'utf-8')

describe('runLinePlot', () => {
  it('resolves the sheet and projects each requested view', () => {
    const run = runLinePlot({ input: simple, views: ['plan', 'flattened_profile'], title: 'Test Cave' })
    expect(run.network.title).toBe('Test Cave')
    expect(run.network.stations).toHaveLength(5)
    expect(run.views.map((v) => [v.view, v.ok])).toEqual([
      ['plan', true],
      ['flattened_profile', true],
    ])
    expect(run.warnings).toEqual([])
    expect(run.logs).toEqual([
      'Shots read: 4',
      'Origin station: A1',
      'Resolved 5 stations from 4 shots',
    ])
  })

  it('fails only the view it does not know', () => {
    const run = runLinePlot({ input: simple, views: ['plan', 'sideways', 'full_3d'] })
    const [plan, sideways, full] = run.views
    expect(plan.ok).toBe(true)
    expect(full.ok).toBe(true)
    expect(sideways.ok).toBe(false)
    if (!sideways.ok) expect(sideways.error).toBeInstanceOf(ViewError)
    expect(run.logs[run.logs.length - 1]).toBe('View sideways failed: Invalid view: sideways')
  })

  it('reports tolerance warnings without stopping', () => {
    const input = 'from,name,distance,azimuth,inclination\nA,B,10,10/170,0\nB,C,10,90,0'
    const run = runLinePlot({ input, views: [] })
    expect(run.warnings.map((w) => w.shot)).toEqual(['A-->B'])
    expect(run.network.stations).toHaveLength(3)
  })

  it('aborts on sheet and network errors', () => {
    expect(() => runLinePlot({ input: readFileSync('tests/fixtures/bad_cell.csv', 'utf-8'), views: [] })).toThrow(
      ParseError,
    )
    expect(() =>
      runLinePlot({ input: 'from,name,distance,azimuth,inclination\nA,B,10,0,0\nX,Y,3,0,0', views: ['plan'] }),
    ).toThrow(ValidationError)
  })
})
