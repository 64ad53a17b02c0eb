export type StationId = string

export type Vec3 = [number, number, number]
export type Vec2 = [number, number]

// A cell of the survey sheet: blank, one reading, or a fore/backsight pair.
export type Reading =
  | { kind: 'absent' }
  | { kind: 'single'; value: number }
  | { kind: 'paired'; fore: number; back: number }

export interface ShotRecord {
  from: StationId
  name: StationId
  distance: number
  azimuth: Reading
  inclination: Reading
  left: Reading
  right: Reading
  up: Reading
  down: Reading
  note: string
}

export interface ReducedShot extends Omit<ShotRecord, 'azimuth' | 'inclination'> {
  azimuth: number // degrees from north
  inclination: number // degrees, positive up
}

export interface Station {
  name: StationId
  position: Vec3 // east, north, up
  flatPosition: Vec2 // along, up
}

export type AngleField = 'azimuth' | 'inclination'

export interface ToleranceWarning {
  shot: string // from-->name
  field: AngleField
  fore: number
  back: number
  difference: number
  tolerance: number
}

export interface NetworkOptions {
  title: string
  distanceUnits: string
  angleTolerance: number // degrees
}

export interface ResolvedNetwork {
  title: string
  distanceUnits: string
  originName: StationId
  stations: Station[]
  shots: ReducedShot[]
}

export interface ParseShotsResult {
  shots: ShotRecord[]
  logs: string[]
}

export type ViewKind = 'full_3d' | 'plan' | 'profile' | 'flattened_profile'
export type AxisName = 'east' | 'north' | 'up' | 'along'

export interface ProjectedPoint {
  name: StationId
  coords: number[]
}

export interface ProjectedSegment {
  from: StationId
  to: StationId
  start: number[]
  end: number[]
}

export interface ViewProjection {
  view: ViewKind
  axes: AxisName[]
  points: ProjectedPoint[]
  segments: ProjectedSegment[]
}

export type ViewOutcome =
  | { view: string; ok: true; projection: ViewProjection }
  | { view: string; ok: false; error: Error }

export interface LinePlotConfig extends Partial<NetworkOptions> {
  input: string
  views: string[]
}

export interface LinePlotRun {
  network: ResolvedNetwork
  views: ViewOutcome[]
  warnings: ToleranceWarning[]
  logs: string[]
}
