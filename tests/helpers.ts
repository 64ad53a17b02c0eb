import type { Reading, ShotRecord } from '../src/types'

const absent: Reading = { kind: 'absent' }

export const reading = (value: number | [number, number] | null): Reading => {
  if (value == null) return absent
  if (Array.isArray(value)) return { kind: 'paired', fore: value[0], back: value[1] }
  return { kind: 'single', value }
}

export const makeShot = (
  from: string,
  name: string,
  distance: number,
  azimuth: number | [number, number] | null,
  inclination: number | [number, number] | null,
  note = '',
): ShotRecord => ({
  from,
  name,
  distance,
  azimuth: reading(azimuth),
  inclination: reading(inclination),
  left: absent,
  right: absent,
  up: absent,
  down: absent,
  note,
})
