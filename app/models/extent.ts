/* eslint-disable max-classes-per-file */
import { TypeMismatchError } from '../util/errors';

export type TemporalBound = Date | string | null;

export interface SerializedExtent {
  spatial: { bbox: number[][] };
  temporal: { interval: (string | null)[][] };
}

/**
 * Spatial extents of a Collection. The first box describes the overall extent; later
 * boxes can describe clusters of data more precisely. Each inner array holds all axes
 * of the south-westerly corner followed by all axes of the north-easterly corner, in
 * WGS 84 longitude/latitude (and optionally elevation).
 *
 * @example
 * new SpatialExtent([[-180, -90, 180, 90]])
 */
export class SpatialExtent {
  bbox: number[][];

  /**
   * @param bbox - potential spatial extents covered by the Collection
   */
  constructor(bbox: number[][]) {
    this.bbox = bbox;
  }

  toJSON(): SerializedExtent['spatial'] {
    return { bbox: this.bbox.map((box) => [...box]) };
  }
}

/**
 * Serializes a temporal bound as an RFC 3339 timestamp
 *
 * @param bound - the bound, `null` for an open range
 * @returns the timestamp, or null
 */
function formatBound(bound: TemporalBound | undefined): string | null {
  if (bound === null || bound === undefined) {
    return null;
  }
  return bound instanceof Date ? bound.toISOString() : bound;
}

/**
 * Temporal extents of a Collection. Each interval holds a start and an end, either of
 * which may be null for an open range.
 *
 * @example
 * new TemporalExtent([[new Date('2019-01-01T00:00:00Z'), null]])
 */
export class TemporalExtent {
  interval: TemporalBound[][];

  /**
   * @param interval - potential temporal extents covered by the Collection
   */
  constructor(interval: TemporalBound[][]) {
    this.interval = interval;
  }

  toJSON(): SerializedExtent['temporal'] {
    return {
      interval: this.interval.map((simpleInterval) => [
        formatBound(simpleInterval[0]),
        formatBound(simpleInterval[1]),
      ]),
    };
  }
}

/**
 * Spatio-temporal extents of a Collection
 */
export default class Extent {
  private _spatial: SpatialExtent;

  private _temporal: TemporalExtent;

  constructor(spatial: SpatialExtent, temporal: TemporalExtent) {
    this._spatial = spatial;
    this._temporal = temporal;
    this.spatial = spatial;
    this.temporal = temporal;
  }

  get spatial(): SpatialExtent {
    return this._spatial;
  }

  set spatial(value: SpatialExtent) {
    if (!(value instanceof SpatialExtent)) {
      throw new TypeMismatchError('spatial must be a SpatialExtent');
    }
    this._spatial = value;
  }

  get temporal(): TemporalExtent {
    return this._temporal;
  }

  set temporal(value: TemporalExtent) {
    if (!(value instanceof TemporalExtent)) {
      throw new TypeMismatchError('temporal must be a TemporalExtent');
    }
    this._temporal = value;
  }

  toJSON(): SerializedExtent {
    return {
      spatial: this._spatial.toJSON(),
      temporal: this._temporal.toJSON(),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
