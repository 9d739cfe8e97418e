/**
 * Test fixtures: paths and traces laid out along a meridian
 *
 * Positions are given as km north of an origin (and optionally km east),
 * so expected lengths and intervals can be read straight off the test.
 */

import * as turf from "@turf/turf";
import { KM_PER_DEGREE, cosLatitude, pathLengthKm } from "../engine/modules/geometry.js";
import type {
  PathInput,
  PathRecord,
  Position,
  RideInput,
  TracePoint,
} from "../engine/types.js";

export const LNG0 = -1.5;
export const LAT0 = 51.0;

const DEG_PER_KM = turf.lengthToDegrees(1, "kilometers");

/** Latitude `km` north of the origin */
export function latAt(km: number): number {
  return LAT0 + km * DEG_PER_KM;
}

/** Longitude `eastKm` east of the origin meridian, at latitude `lat` */
export function lngAt(eastKm: number, lat: number): number {
  return LNG0 + eastKm / (KM_PER_DEGREE * cosLatitude(lat));
}

/** Position `northKm` north and `eastKm` east of the origin */
export function pos(northKm: number, eastKm = 0): Position {
  const lat = latAt(northKm);
  return [lngAt(eastKm, lat), lat];
}

/** Evenly spaced positions from `fromKm` to `toKm` north, both included */
export function meridianLine(
  fromKm: number,
  toKm: number,
  stepKm = 0.25,
  eastKm = 0
): Position[] {
  const steps = Math.max(1, Math.round(Math.abs(toKm - fromKm) / stepKm));
  const line: Position[] = [];
  for (let i = 0; i <= steps; i++) {
    line.push(pos(fromKm + ((toKm - fromKm) * i) / steps, eastKm));
  }
  return line;
}

export function meridianPath(
  sourceFid: string,
  fromKm: number,
  toKm: number,
  extra: Partial<Omit<PathInput, "sourceFid" | "geometry">> = {}
): PathInput {
  return {
    sourceFid,
    pathType: "Bridleway",
    area: "Testshire",
    ...extra,
    geometry: { type: "LineString", coordinates: meridianLine(fromKm, toKm) },
  };
}

export function toPathRecord(input: PathInput): PathRecord {
  return {
    id: input.sourceFid,
    sourceFid: input.sourceFid,
    routeCode: input.routeCode ?? null,
    name: input.name ?? null,
    pathType: input.pathType ?? null,
    area: input.area ?? null,
    geometry: input.geometry,
    lengthKm: pathLengthKm(input.geometry, "geodesic"),
  };
}

export interface TraceOptions {
  stepKm?: number;
  eastKm?: number;
  /** Time of the first point; later points follow at 10s intervals */
  start?: Date;
}

/** GPS points riding north (or south) between two distances */
export function meridianTrace(
  fromKm: number,
  toKm: number,
  options: TraceOptions = {}
): TracePoint[] {
  const line = meridianLine(fromKm, toKm, options.stepKm ?? 0.05, options.eastKm ?? 0);
  return line.map(([lng, lat], i) => {
    const point: TracePoint = { lat, lng };
    if (options.start) {
      point.timestamp = new Date(options.start.getTime() + i * 10_000);
    }
    return point;
  });
}

export function rideInput(
  filename: string,
  points: TracePoint[],
  dateRecorded: Date | null = null
): RideInput {
  return { filename, name: filename.replace(/\.gpx$/, ""), dateRecorded, points };
}

/** GPX document for a list of trace points */
export function toGpx(points: TracePoint[], name = "Test Ride"): string {
  return toGpxSegments([points], name);
}

/** GPX document with one <trkseg> per list of trace points */
export function toGpxSegments(segments: TracePoint[][], name = "Test Ride"): string {
  const trksegs = segments
    .map((points) => {
      const trackpoints = points
        .map((p) => {
          const ele = p.elevation !== undefined ? `<ele>${p.elevation}</ele>` : "";
          const time = p.timestamp ? `<time>${p.timestamp.toISOString()}</time>` : "";
          return `<trkpt lat="${p.lat}" lon="${p.lng}">${ele}${time}</trkpt>`;
        })
        .join("\n      ");
      return `<trkseg>
      ${trackpoints}
    </trkseg>`;
    })
    .join("\n    ");

  return `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="Test" xmlns="http://www.topografix.com/GPX/1/1">
  <trk>
    <name>${name}</name>
    ${trksegs}
  </trk>
</gpx>`;
}

/** GeoJSON FeatureCollection for a list of path inputs */
export function toFeatureCollection(paths: PathInput[]): {
  type: "FeatureCollection";
  features: Array<Record<string, unknown>>;
} {
  return {
    type: "FeatureCollection",
    features: paths.map((path) => ({
      type: "Feature",
      properties: {
        source_fid: path.sourceFid,
        route_code: path.routeCode ?? null,
        name: path.name ?? null,
        path_type: path.pathType ?? null,
        area: path.area ?? null,
      },
      geometry: path.geometry,
    })),
  };
}
