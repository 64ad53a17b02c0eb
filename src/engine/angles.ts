export const RAD_TO_DEG = 180 / Math.PI
export const DEG_TO_RAD = Math.PI / 180

export const normalizeDegrees = (deg: number): number => ((deg % 360) + 360) % 360

// Smallest absolute separation of two bearings, in [0, 180].
export const angularDifference = (a: number, b: number): number => {
  const d = normalizeDegrees(a - b)
  return d > 180 ? 360 - d : d
}

export const circularMeanDeg = (values: number[]): number => {
  let sinSum = 0
  let cosSum = 0
  for (const v of values) {
    sinSum += Math.sin(v * DEG_TO_RAD)
    cosSum += Math.cos(v * DEG_TO_RAD)
  }
  return normalizeDegrees(Math.atan2(sinSum, cosSum) * RAD_TO_DEG)
}

export const backsightAzimuth = (back: number): number => normalizeDegrees(back + 180)

export const backsightInclination = (back: number): number => -back

export const formatDegrees = (deg: number, digits = 2): string => `${deg.toFixed(digits)}°`
