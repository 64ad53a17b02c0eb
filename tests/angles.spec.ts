import { describe, expect, it } from 'vitest'
import {
  angularDifference,
  backsightAzimuth,
  backsightInclination,
  circularMeanDeg,
  normalizeDegrees,
} from '../src/engine/angles'

describe('angles helpers', () => {
  it('wraps degrees into 0-360', () => {
    expect(normalizeDegrees(370)).toBe(10)
    expect(normalizeDegrees(-10)).toBe(350)
    expect(normalizeDegrees(360)).toBe(0)
  })

  it('measures the short way round between bearings', () => {
    expect(angularDifference(359, 1)).toBeCloseTo(2, 9)
    expect(angularDifference(10, 350)).toBeCloseTo(20, 9)
    expect(angularDifference(90, 270)).toBe(180)
  })

  it('averages bearings across north', () => {
    expect(circularMeanDeg([350, 10])).toBeCloseTo(0, 9)
    expect(circularMeanDeg([10, 10])).toBeCloseTo(10, 9)
    expect(circularMeanDeg([80, 100])).toBeCloseTo(90, 9)
  })

  it('turns backsights around', () => {
    expect(backsightAzimuth(190)).toBe(10)
    expect(backsightAzimuth(90)).toBe(270)
    expect(backsightInclination(12)).toBe(-12)
  })
})
