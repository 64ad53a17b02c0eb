import { angularDifference, backsightAzimuth, backsightInclination, formatDegrees } from './angles';
import { ValidationError } from './errors';
import { reduceShot, resolvePositions, shotLabel } from './resolve';
import type {
  AngleField,
  NetworkOptions,
  ResolvedNetwork,
  ShotRecord,
  StationId,
  ToleranceWarning,
} from '../types';

export const defaultNetworkOptions: NetworkOptions = {
  title: 'Cave',
  distanceUnits: 'feet',
  angleTolerance: 2.0,
};

/**
 * Collects shots in survey order and resolves them into a positioned line plot.
 */
export class SurveyNetwork {
  title: string;
  distanceUnits: string;
  angleTolerance: number;
  shots: ShotRecord[] = [];
  originName: StationId | null = null;
  warnings: ToleranceWarning[] = [];
  logs: string[] = [];
  // station name -> shot that introduced it (null for the origin)
  private stations = new Map<StationId, ShotRecord | null>();

  constructor(opts: Partial<NetworkOptions> = {}) {
    const { title, distanceUnits, angleTolerance } = { ...defaultNetworkOptions, ...opts };
    this.title = title;
    this.distanceUnits = distanceUnits;
    this.angleTolerance = angleTolerance;
  }

  private log(msg: string) {
    this.logs.push(msg);
  }

  hasStation(name: StationId): boolean {
    return this.stations.has(name);
  }

  addShot(shot: ShotRecord): void {
    const label = shotLabel(shot);

    if (!Number.isFinite(shot.distance) || shot.distance <= 0) {
      throw new ValidationError(`Shot ${label} has non-positive distance ${shot.distance}`, label, 'distance');
    }
    if (this.shots.length > 0 && !this.stations.has(shot.from)) {
      throw new ValidationError(`Shot ${label} starts from unknown station ${shot.from}`, label, 'unknown_from');
    }
    if (this.stations.has(shot.name) || shot.name === shot.from) {
      throw new ValidationError(`Station ${shot.name} is already in the network (shot ${label})`, label, 'duplicate_name');
    }
    // throws on a missing angle
    reduceShot(shot);

    this.checkPair(shot, 'azimuth');
    this.checkPair(shot, 'inclination');

    if (this.shots.length === 0) {
      this.originName = shot.from;
      this.stations.set(shot.from, null);
    }
    this.shots.push(shot);
    this.stations.set(shot.name, shot);
  }

  addShots(shots: Iterable<ShotRecord>): void {
    for (const shot of shots) this.addShot(shot);
  }

  private checkPair(shot: ShotRecord, field: AngleField) {
    const reading = shot[field];
    if (reading.kind !== 'paired') return;
    const { fore, back } = reading;
    const difference =
      field === 'azimuth'
        ? angularDifference(fore, backsightAzimuth(back))
        : Math.abs(fore - backsightInclination(back));
    if (difference <= this.angleTolerance) return;

    const warning: ToleranceWarning = {
      shot: shotLabel(shot),
      field,
      fore,
      back,
      difference,
      tolerance: this.angleTolerance,
    };
    this.warnings.push(warning);
    this.log(
      `Warning: ${field} ${fore}/${back} in shot ${warning.shot} disagrees by ${formatDegrees(difference)}, ` +
        `outside tolerance of ${formatDegrees(this.angleTolerance)}`,
    );
  }

  process(): ResolvedNetwork {
    const resolved = resolvePositions(this.shots);
    resolved.logs.forEach((msg) => this.log(msg));
    return {
      title: this.title,
      distanceUnits: this.distanceUnits,
      originName: resolved.originName,
      stations: resolved.stations,
      shots: resolved.shots,
    };
  }
}
