import { DEG_TO_RAD, backsightAzimuth, backsightInclination, circularMeanDeg } from './angles';
import { ConnectivityError, ValidationError } from './errors';
import type { Reading, ReducedShot, ShotRecord, Station, StationId, Vec2, Vec3 } from '../types';

export const shotLabel = (shot: Pick<ShotRecord, 'from' | 'name'>): string => `${shot.from}-->${shot.name}`;

const reduceAzimuth = (reading: Reading): number | null => {
  switch (reading.kind) {
    case 'absent':
      return null;
    case 'single':
      return reading.value;
    case 'paired':
      return circularMeanDeg([reading.fore, backsightAzimuth(reading.back)]);
  }
};

// Backsight is negated before averaging, matching the tolerance check.
const reduceInclination = (reading: Reading): number | null => {
  switch (reading.kind) {
    case 'absent':
      return null;
    case 'single':
      return reading.value;
    case 'paired':
      return (reading.fore + backsightInclination(reading.back)) / 2;
  }
};

/**
 * Collapses fore/backsight pairs into single angles.
 * An absent azimuth is only accepted on a vertical shot, where it reads as 0.
 */
export const reduceShot = (shot: ShotRecord): ReducedShot => {
  const inclination = reduceInclination(shot.inclination);
  if (inclination == null) {
    throw new ValidationError(`Shot ${shotLabel(shot)} has no inclination`, shotLabel(shot), 'missing_angle');
  }
  let azimuth = reduceAzimuth(shot.azimuth);
  if (azimuth == null) {
    if (Math.abs(inclination) !== 90) {
      throw new ValidationError(`Shot ${shotLabel(shot)} has no azimuth`, shotLabel(shot), 'missing_angle');
    }
    azimuth = 0;
  }
  return { ...shot, azimuth, inclination };
};

export const forwardPosition = (prev: Vec3, shot: ReducedShot): Vec3 => {
  const [x0, y0, z0] = prev;
  const azi = shot.azimuth * DEG_TO_RAD;
  const incl = shot.inclination * DEG_TO_RAD;
  const horiz = shot.distance * Math.cos(incl);
  return [x0 + horiz * Math.sin(azi), y0 + horiz * Math.cos(azi), z0 + shot.distance * Math.sin(incl)];
};

// Unrolls horizontal travel onto one axis; azimuth is ignored.
export const flatPosition = (prev: Vec2, shot: ReducedShot): Vec2 => {
  const [w0, z0] = prev;
  const incl = shot.inclination * DEG_TO_RAD;
  return [w0 + shot.distance * Math.cos(incl), z0 + shot.distance * Math.sin(incl)];
};

export interface ResolveResult {
  originName: StationId;
  stations: Station[];
  shots: ReducedShot[];
  logs: string[];
}

/**
 * Positions every station by walking shots outward from the origin, the `from` of the
 * first shot. A shot resolves as soon as its `from` is positioned: shots ready after the
 * first one go in input order, and each resolved shot queues the shots waiting on its target.
 */
export const resolvePositions = (shots: readonly ShotRecord[]): ResolveResult => {
  if (shots.length === 0) {
    throw new ValidationError('No shots to resolve', '', 'empty_network');
  }

  const reduced = shots.map(reduceShot);
  const originName = reduced[0].from;
  const logs: string[] = [`Origin station: ${originName}`];

  const origin: Station = { name: originName, position: [0, 0, 0], flatPosition: [0, 0] };
  const done = new Map<StationId, Station>([[originName, origin]]);
  const resolvedShots: ReducedShot[] = [];

  const resolveShot = (shot: ReducedShot) => {
    const prev = done.get(shot.from);
    if (!prev) throw new ConnectivityError([shotLabel(shot)]);
    if (done.has(shot.name)) {
      throw new ValidationError(
        `Station ${shot.name} is positioned twice (shot ${shotLabel(shot)})`,
        shotLabel(shot),
        'duplicate_name',
      );
    }
    done.set(shot.name, {
      name: shot.name,
      position: forwardPosition(prev.position, shot),
      flatPosition: flatPosition(prev.flatPosition, shot),
    });
    resolvedShots.push(shot);
  };

  const [first, ...rest] = reduced;
  resolveShot(first);

  // Shots ready once the first target is fixed, in input order; the rest wait on their `from`.
  const queue: ReducedShot[] = [];
  const pendingByFrom = new Map<StationId, ReducedShot[]>();
  for (const shot of rest) {
    if (done.has(shot.from)) {
      queue.push(shot);
      continue;
    }
    const list = pendingByFrom.get(shot.from);
    if (list) list.push(shot);
    else pendingByFrom.set(shot.from, [shot]);
  }

  for (let head = 0; head < queue.length; head++) {
    const shot = queue[head];
    resolveShot(shot);
    const waiting = pendingByFrom.get(shot.name);
    if (waiting) {
      pendingByFrom.delete(shot.name);
      queue.push(...waiting);
    }
  }

  if (resolvedShots.length < reduced.length) {
    const unreachable = reduced.filter((shot) => !resolvedShots.includes(shot)).map(shotLabel);
    throw new ConnectivityError(unreachable);
  }

  logs.push(`Resolved ${done.size} stations from ${resolvedShots.length} shots`);
  return { originName, stations: [...done.values()], shots: resolvedShots, logs };
};
