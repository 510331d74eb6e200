import _ from 'lodash';
import type { BBox, Geometry as GeoJsonGeometryObject, Position } from 'geojson';
import { TypeMismatchError } from './errors';

/**
 * The footprint of an Item
 */
export interface Geometry {
  /**
   * The bounding box of the geometry, as a flat array of all axes of the minimum
   * corner followed by all axes of the maximum corner. Empty for a geometry without
   * positions.
   */
  bounds(): number[];

  /**
   * The GeoJSON (RFC 7946) representation of the geometry
   */
  toInterchangeFormat(): GeoJsonGeometryObject;
}

/**
 * Creates a GeoJSON geometry given a GeoJSON BBox, accounting for antimeridian
 *
 * @param bbox - the bounding box to create a geometry from
 * @returns a Polygon or MultiPolygon representation of the input bbox
 */
export function bboxToGeometry(bbox: BBox): GeoJsonGeometryObject {
  const [west, south, east, north] = bbox.length === 6
    ? [bbox[0], bbox[1], bbox[3], bbox[4]]
    : bbox;
  if (west > east) {
    return {
      type: 'MultiPolygon',
      coordinates: [
        [[
          [-180, south],
          [-180, north],
          [east, north],
          [east, south],
          [-180, south],
        ]],
        [[
          [west, south],
          [west, north],
          [180, north],
          [180, south],
          [west, south],
        ]],
      ],
    };
  }
  return {
    type: 'Polygon',
    coordinates: [[
      [west, south],
      [west, north],
      [east, north],
      [east, south],
      [west, south],
    ]],
  };
}

/**
 * Returns every position of a geometry
 *
 * @param geometry - the GeoJSON geometry
 * @returns the positions, in document order
 */
function positions(geometry: GeoJsonGeometryObject): Position[] {
  switch (geometry.type) {
    case 'Point':
      return [geometry.coordinates];
    case 'MultiPoint':
    case 'LineString':
      return geometry.coordinates;
    case 'MultiLineString':
    case 'Polygon':
      return geometry.coordinates.flat();
    case 'MultiPolygon':
      return geometry.coordinates.flat(2);
    case 'GeometryCollection':
      return geometry.geometries.flatMap(positions);
    default:
      throw new TypeMismatchError('Unsupported GeoJSON geometry type');
  }
}

/**
 * A geometry backed by a GeoJSON object. Bounds are computed in the plane of the
 * coordinates, so a footprint crossing the antimeridian should be split first.
 */
export class GeoJsonGeometry implements Geometry {
  private readonly geometry: GeoJsonGeometryObject;

  constructor(geometry: GeoJsonGeometryObject) {
    this.geometry = geometry;
  }

  /**
   * Builds the geometry covering a bounding box
   *
   * @param bbox - the box, as `[west, south, east, north]`
   * @returns the geometry
   */
  static fromBbox(bbox: BBox): GeoJsonGeometry {
    return new GeoJsonGeometry(bboxToGeometry(bbox));
  }

  bounds(): number[] {
    const all = positions(this.geometry);
    if (all.length === 0) {
      return [];
    }
    const dimensions = all.reduce((fewest, p) => Math.min(fewest, p.length), Infinity);
    const min = all[0].slice(0, dimensions);
    const max = all[0].slice(0, dimensions);
    for (const position of all) {
      for (let axis = 0; axis < dimensions; axis++) {
        if (position[axis] < min[axis]) min[axis] = position[axis];
        if (position[axis] > max[axis]) max[axis] = position[axis];
      }
    }
    return [...min, ...max];
  }

  toInterchangeFormat(): GeoJsonGeometryObject {
    return _.cloneDeep(this.geometry);
  }
}
