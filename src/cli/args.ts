import type { LinePlotConfig, ViewKind } from '../types'

export const VIEW_FLAGS: Record<string, ViewKind> = {
  plan: 'plan',
  profile: 'profile',
  flat: 'flattened_profile',
  '3d': 'full_3d',
}

const VALUE_FLAGS = new Set(['out', 'title', 'units', 'tolerance'])

export interface CliArgs {
  files: string[]
  flags: Set<string>
  values: Record<string, string>
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { files: [], flags: new Set(), values: {} }
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (!a.startsWith('--')) {
      out.files.push(a)
      continue
    }
    const key = a.slice(2)
    const val = argv[i + 1]
    if (VALUE_FLAGS.has(key) && val !== undefined && !val.startsWith('--')) {
      out.values[key] = val
      i++
    } else {
      out.flags.add(key)
    }
  }
  return out
}

export function toConfig(args: CliArgs, input: string): LinePlotConfig {
  const views = Object.keys(VIEW_FLAGS)
    .filter((flag) => args.flags.has(flag))
    .map((flag) => VIEW_FLAGS[flag])
  const config: LinePlotConfig = { input, views }
  if (args.values.title) config.title = args.values.title
  if (args.values.units) config.distanceUnits = args.values.units
  if (args.values.tolerance) {
    const tol = Number(args.values.tolerance)
    if (!Number.isFinite(tol) || tol < 0) throw new Error(`Invalid --tolerance: ${args.values.tolerance}`)
    config.angleTolerance = tol
  }
  return config
}
