/**
 * GPX Service
 * Decodes GPX ride recordings into engine ride inputs
 *
 * How it works:
 * 1. Parse XML using @xmldom/xmldom
 * 2. Convert to GeoJSON using @tmcw/togeojson
 * 3. Flatten every track segment (and route) into one ordered list of
 *    TracePoints, taking per-point times from togeojson's coordinateProperties
 *
 * GPX Structure (simplified):
 * <gpx>
 *   <metadata><name>Ride Name</name><time>2026-03-01T09:00:00Z</time></metadata>
 *   <trk>
 *     <name>Track Name</name>
 *     <trkseg>
 *       <trkpt lat="51.06" lon="-1.31">
 *         <ele>92.4</ele>
 *         <time>2026-03-01T09:00:05Z</time>
 *       </trkpt>
 *       ...more points...
 *     </trkseg>
 *   </trk>
 * </gpx>
 *
 * Segments are concatenated in document order. The first point of every
 * segment after the first carries `segmentStart`, and the matcher credits
 * nothing between that point and the one before it.
 */

import { DOMParser } from "@xmldom/xmldom";
import * as toGeoJSON from "@tmcw/togeojson";
import type { Feature, GeoJsonProperties, Geometry } from "geojson";
import type { RideInput, TracePoint } from "../engine/types.js";
import { GPX_UPLOAD } from "../config/constants.js";

export interface ParsedGpx {
  name: string | null;
  /** Metadata time, falling back to the first point time */
  startTime: Date | null;
  points: TracePoint[];
}

// ============================================
// Main Parse Function
// ============================================

/**
 * Parse GPX content from a Buffer into trace points
 *
 * @param buffer - Raw GPX file content (from a Multer upload or disk)
 * @throws GpxParseError if the file is not GPX or has too few track points
 *
 * @example
 * const gpx = parseGpxBuffer(req.file.buffer);
 * console.log(gpx.points.length, gpx.name);
 */
export function parseGpxBuffer(buffer: Buffer): ParsedGpx {
  const gpxContent = buffer.toString("utf-8");
  const dom = parseXml(gpxContent);

  if (dom.documentElement?.nodeName !== "gpx") {
    throw new GpxParseError("Invalid GPX file: root element is not <gpx>");
  }

  const geoJson = toGeoJSON.gpx(dom);
  if (geoJson.features.length === 0) {
    throw new GpxParseError("No tracks found in GPX file");
  }

  const points = joinSegments(geoJson.features.flatMap(extractFeatureSegments));

  if (points.length < GPX_UPLOAD.MIN_POINTS) {
    throw new GpxParseError(
      `GPX file must contain at least ${GPX_UPLOAD.MIN_POINTS} track points`
    );
  }

  const metadataTime = parseTime(firstText(dom, "metadata", "time"));
  const firstPointTime = points.find((p) => p.timestamp)?.timestamp ?? null;

  return {
    name: extractGpxName(dom),
    startTime: metadataTime ?? firstPointTime,
    points,
  };
}

/**
 * Decode a GPX upload straight into the engine's ride input.
 */
export function gpxToRideInput(filename: string, buffer: Buffer): RideInput {
  const gpx = parseGpxBuffer(buffer);
  return {
    filename,
    name: gpx.name,
    dateRecorded: gpx.startTime,
    points: gpx.points,
  };
}

function parseXml(content: string): Document {
  const errors: string[] = [];
  let dom: Document;

  try {
    dom = new DOMParser({
      errorHandler: {
        error: (msg: string) => errors.push(msg),
        fatalError: (msg: string) => errors.push(msg),
      },
    }).parseFromString(content, "text/xml");
  } catch (error) {
    throw new GpxParseError(
      `Invalid GPX file: ${error instanceof Error ? error.message : "malformed XML"}`
    );
  }

  if (errors.length > 0 || dom.getElementsByTagName("parsererror").length > 0) {
    throw new GpxParseError("Invalid GPX file: malformed XML");
  }
  return dom;
}

// ============================================
// Point Extraction
// ============================================

/**
 * Recorded segments of one togeojson feature.
 *
 * GeoJSON coordinate order is [lng, lat, elevation?]. A LineString carries
 * `coordinateProperties.times` as string[]; a MultiLineString (several
 * <trkseg>) as string[][], one list per segment.
 */
function extractFeatureSegments(feature: Feature<Geometry | null>): TracePoint[][] {
  const geometry = feature.geometry;
  const times = readCoordinateTimes(feature.properties);

  if (geometry?.type === "LineString") {
    return [
      geometry.coordinates.map((coord, i) => toTracePoint(coord, timeAt(times, i))),
    ];
  }

  if (geometry?.type === "MultiLineString") {
    return geometry.coordinates.map((line, segment) => {
      const segmentTimes = times?.[segment];
      return line.map((coord, i) =>
        toTracePoint(
          coord,
          Array.isArray(segmentTimes) ? timeAt(segmentTimes, i) : undefined
        )
      );
    });
  }

  // Waypoints (Point features) are not part of the ride
  return [];
}

/** One point list, with `segmentStart` on the first point after each break */
function joinSegments(segments: TracePoint[][]): TracePoint[] {
  const points: TracePoint[] = [];
  for (const segment of segments) {
    if (segment.length === 0) continue;
    if (points.length > 0) segment[0].segmentStart = true;
    points.push(...segment);
  }
  return points;
}

function toTracePoint(coord: number[], time: string | undefined): TracePoint {
  const point: TracePoint = { lng: coord[0], lat: coord[1] };
  if (coord.length > 2 && Number.isFinite(coord[2])) {
    point.elevation = coord[2];
  }
  const timestamp = parseTime(time);
  if (timestamp) {
    point.timestamp = timestamp;
  }
  return point;
}

function readCoordinateTimes(properties: GeoJsonProperties): unknown[] | null {
  const coordinateProperties: unknown = properties?.coordinateProperties;
  if (typeof coordinateProperties !== "object" || coordinateProperties === null) {
    return null;
  }
  const times: unknown =
    "times" in coordinateProperties ? coordinateProperties.times : undefined;
  return Array.isArray(times) ? times : null;
}

function timeAt(times: unknown[] | null, index: number): string | undefined {
  const value = times?.[index];
  return typeof value === "string" ? value : undefined;
}

function parseTime(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

// ============================================
// Metadata Extraction
// ============================================

/**
 * Track name, falling back to the file's metadata name.
 */
function extractGpxName(dom: Document): string | null {
  const name = firstText(dom, "trk", "name") ?? firstText(dom, "metadata", "name");
  return name && name.trim() !== "" ? name.trim() : null;
}

/** Text of the first <child> inside the first <parent> */
function firstText(dom: Document, parent: string, child: string): string | null {
  const parentElement = dom.getElementsByTagName(parent)[0];
  if (!parentElement) return null;
  return parentElement.getElementsByTagName(child)[0]?.textContent ?? null;
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Custom error class for GPX parsing errors
 *
 * Thrown when:
 * - XML is malformed or the root element is not <gpx>
 * - No tracks found in file
 * - Too few track points
 *
 * A batch upload reports it as that file's outcome and carries on.
 */
export class GpxParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GpxParseError";
  }
}
