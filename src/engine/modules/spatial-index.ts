/**
 * Grid-based spatial index over path segments.
 *
 * Every segment of every path is bucketed into the grid cells it passes
 * through. Queries return candidate segments near a point or a trace
 * segment; exact tolerance filtering is the matcher's job.
 *
 * The grid works in a flat-earth frame centred on the network's mean
 * latitude. Queries convert their radius to that frame at the query's own
 * latitude, so a network spanning a few degrees still answers correctly.
 */

import type { DistanceMode, PathRecord, Position } from "../types.js";
import {
  KM_PER_DEGREE,
  cosLatitude,
  geometryParts,
  segmentLengthKm,
} from "./geometry.js";

/** One indexed path segment with its position along the path */
export interface PathSegmentRef {
  pathId: string;
  partIndex: number;
  segmentIndex: number;
  start: Position;
  end: Position;
  /** Arc length from the path's first vertex to `start` */
  offsetKm: number;
  lengthKm: number;
}

export class PathSpatialIndex {
  /** cell key -> segments touching that cell */
  private grid = new Map<string, PathSegmentRef[]>();
  private readonly cellSizeKm: number;
  private readonly refCos: number;
  private segmentTotal = 0;

  constructor(
    paths: Iterable<PathRecord>,
    cellSizeKm: number,
    private readonly distanceMode: DistanceMode
  ) {
    this.cellSizeKm = cellSizeKm;

    const pathList = [...paths];
    let sumLat = 0;
    let count = 0;
    for (const path of pathList) {
      for (const part of geometryParts(path.geometry)) {
        for (const [, lat] of part) {
          sumLat += lat;
          count++;
        }
      }
    }
    this.refCos = cosLatitude(count > 0 ? sumLat / count : 0);

    for (const path of pathList) {
      this.addPath(path);
    }
  }

  /** Number of indexed (non-degenerate) segments */
  get size(): number {
    return this.segmentTotal;
  }

  /**
   * Candidate segments within roughly `radiusKm` of a point.
   */
  segmentsNearPoint(p: Position, radiusKm: number): PathSegmentRef[] {
    return this.segmentsNearSegment(p, p, radiusKm);
  }

  /**
   * Candidate segments within roughly `radiusKm` of any point of p-q.
   */
  segmentsNearSegment(p: Position, q: Position, radiusKm: number): PathSegmentRef[] {
    const [px, py] = this.toGrid(p);
    const [qx, qy] = this.toGrid(q);

    // A km of longitude at the query latitude spans more grid units than at the
    // reference latitude when the query is further from the equator.
    const queryCos = Math.min(cosLatitude(p[1]), cosLatitude(q[1]));
    const rx = (radiusKm * this.refCos) / queryCos;
    const ry = radiusKm;

    const minCx = this.cellIndex(Math.min(px, qx) - rx) - 1;
    const maxCx = this.cellIndex(Math.max(px, qx) + rx) + 1;
    const minCy = this.cellIndex(Math.min(py, qy) - ry) - 1;
    const maxCy = this.cellIndex(Math.max(py, qy) + ry) + 1;

    const seen = new Set<PathSegmentRef>();
    for (let cx = minCx; cx <= maxCx; cx++) {
      for (let cy = minCy; cy <= maxCy; cy++) {
        const bucket = this.grid.get(cellKey(cx, cy));
        if (!bucket) continue;
        for (const ref of bucket) seen.add(ref);
      }
    }

    return [...seen];
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private addPath(path: PathRecord): void {
    let offsetKm = 0;

    geometryParts(path.geometry).forEach((part, partIndex) => {
      for (let i = 1; i < part.length; i++) {
        const start = part[i - 1];
        const end = part[i];
        const lengthKm = segmentLengthKm(start, end, this.distanceMode);

        if (lengthKm > 0) {
          this.addSegment({
            pathId: path.id,
            partIndex,
            segmentIndex: i - 1,
            start,
            end,
            offsetKm,
            lengthKm,
          });
        }
        offsetKm += lengthKm;
      }
    });
  }

  /**
   * Walk the segment in half-cell steps and record each cell it visits.
   * A cell clipped between two samples is adjacent to a visited one, which
   * the one-cell query padding picks up.
   */
  private addSegment(ref: PathSegmentRef): void {
    const [ax, ay] = this.toGrid(ref.start);
    const [bx, by] = this.toGrid(ref.end);
    const spanKm = Math.hypot(bx - ax, by - ay);
    const steps = Math.max(1, Math.ceil(spanKm / (this.cellSizeKm / 2)));

    const cells = new Set<string>();
    for (let s = 0; s <= steps; s++) {
      const f = s / steps;
      cells.add(
        cellKey(
          this.cellIndex(ax + f * (bx - ax)),
          this.cellIndex(ay + f * (by - ay))
        )
      );
    }

    for (const key of cells) {
      let bucket = this.grid.get(key);
      if (!bucket) {
        bucket = [];
        this.grid.set(key, bucket);
      }
      bucket.push(ref);
    }
    this.segmentTotal++;
  }

  private toGrid([lng, lat]: Position): [number, number] {
    return [lng * KM_PER_DEGREE * this.refCos, lat * KM_PER_DEGREE];
  }

  private cellIndex(valueKm: number): number {
    return Math.floor(valueKm / this.cellSizeKm);
  }
}

function cellKey(cx: number, cy: number): string {
  return `${cx},${cy}`;
}
