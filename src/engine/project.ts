import { CavemapError, ViewError } from './errors'
import type { AxisName, ResolvedNetwork, Station, ViewKind, ViewProjection } from '../types'

interface ViewAxes {
  axes: AxisName[]
  select: (station: Station) => number[]
}

const VIEW_AXES: Record<ViewKind, ViewAxes> = {
  full_3d: { axes: ['east', 'north', 'up'], select: (s) => [...s.position] },
  plan: { axes: ['east', 'north'], select: (s) => [s.position[0], s.position[1]] },
  profile: { axes: ['north', 'up'], select: (s) => [s.position[1], s.position[2]] },
  flattened_profile: { axes: ['along', 'up'], select: (s) => [...s.flatPosition] },
}

export const VIEW_KINDS: ViewKind[] = ['full_3d', 'plan', 'profile', 'flattened_profile']

const isViewKind = (value: string): value is ViewKind => VIEW_KINDS.some((kind) => kind === value)

export const parseViewKind = (value: string): ViewKind => {
  if (!isViewKind(value)) throw new ViewError(value)
  return value
}

/**
 * Picks the coordinate axes a view needs from every station and shot segment.
 * Profiles are taken looking along the east axis; no rotation is applied.
 */
export const projectView = (network: ResolvedNetwork, view: string): ViewProjection => {
  const kind = parseViewKind(view)
  const { axes, select } = VIEW_AXES[kind]
  const coordsByName = new Map(network.stations.map((s): [string, number[]] => [s.name, select(s)]))

  const points = network.stations.map((s) => ({ name: s.name, coords: select(s) }))
  const segments = network.shots.map((shot) => {
    const start = coordsByName.get(shot.from)
    const end = coordsByName.get(shot.name)
    if (!start || !end) throw new CavemapError(`Shot ${shot.from}-->${shot.name} is not positioned`)
    return { from: shot.from, to: shot.name, start, end }
  })

  return { view: kind, axes, points, segments }
}
