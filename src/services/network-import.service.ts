/**
 * Network Import Service
 * Decodes a rights-of-way GeoJSON export into engine path inputs
 *
 * Expected input is a FeatureCollection of LineString / MultiLineString
 * features. Attribute names vary between council exports, so each field is
 * looked up under a few common spellings, case-insensitively:
 *
 * | Field      | Property keys                                  |
 * |------------|------------------------------------------------|
 * | sourceFid  | source_fid, fid, objectid (else feature.id)    |
 * | routeCode  | route_code, prow_ref, route_no                 |
 * | name       | name, path_name                                |
 * | pathType   | path_type, prow_type, type                     |
 * | area       | area, parish, district                         |
 *
 * Features that cannot become a path (no id, unsupported geometry,
 * non-numeric positions) are reported individually; the rest still import.
 */

import type { Feature, FeatureCollection, GeoJsonProperties } from "geojson";
import { ERROR_CODES } from "../config/constants.js";
import type { CoverageEngine } from "../engine/index.js";
import type {
  ImportNetworkOptions,
  NetworkImportResult,
  PathGeometry,
  PathInput,
  PathRejection,
  Position,
} from "../engine/types.js";

export interface ParsedNetwork {
  paths: PathInput[];
  /** Index of the source feature for each entry of `paths` */
  featureIndexes: number[];
  rejected: PathRejection[];
  featureCount: number;
}

const PROPERTY_KEYS = {
  sourceFid: ["source_fid", "fid", "objectid"],
  routeCode: ["route_code", "prow_ref", "route_no"],
  name: ["name", "path_name"],
  pathType: ["path_type", "prow_type", "type"],
  area: ["area", "parish", "district"],
} as const;

/** Common abbreviations in exports, mapped to the legend's labels */
const PATH_TYPE_ALIASES: Record<string, string> = {
  fp: "Footpath",
  footpath: "Footpath",
  br: "Bridleway",
  bw: "Bridleway",
  bridleway: "Bridleway",
  rb: "Restricted Byway",
  "restricted byway": "Restricted Byway",
  boat: "BOAT",
  "byway open to all traffic": "BOAT",
};

// ============================================
// Parsing
// ============================================

/**
 * Decode a network file's JSON.
 *
 * @throws NetworkParseError if the buffer is not valid JSON
 */
export function decodeNetworkBuffer(buffer: Buffer): unknown {
  try {
    return JSON.parse(buffer.toString("utf-8"));
  } catch {
    throw new NetworkParseError("Network file is not valid JSON");
  }
}

/**
 * Parse a GeoJSON file buffer.
 *
 * @throws NetworkParseError if the buffer is not JSON or not a FeatureCollection
 */
export function parseNetworkBuffer(buffer: Buffer): ParsedNetwork {
  return parseNetworkGeoJson(decodeNetworkBuffer(buffer));
}

/**
 * Turn a decoded GeoJSON value into path inputs.
 *
 * @throws NetworkParseError if the value is not a FeatureCollection
 */
export function parseNetworkGeoJson(json: unknown): ParsedNetwork {
  if (!isFeatureCollection(json)) {
    throw new NetworkParseError(
      "Network must be a GeoJSON FeatureCollection with a features array"
    );
  }

  const result: ParsedNetwork = {
    paths: [],
    featureIndexes: [],
    rejected: [],
    featureCount: json.features.length,
  };

  json.features.forEach((feature: unknown, index) => {
    const parsed = parseFeature(feature);
    if ("reason" in parsed) {
      result.rejected.push({ index, ...parsed });
      return;
    }
    result.paths.push(parsed);
    result.featureIndexes.push(index);
  });

  return result;
}

function parseFeature(
  feature: unknown
): PathInput | Omit<PathRejection, "index"> {
  if (!isFeature(feature)) {
    return {
      sourceFid: null,
      code: ERROR_CODES.NETWORK_PARSE_ERROR,
      reason: "Not a GeoJSON Feature",
    };
  }

  const props = feature.properties;
  const sourceFid =
    readString(props, PROPERTY_KEYS.sourceFid) ?? idToString(feature.id);
  if (!sourceFid) {
    return {
      sourceFid: null,
      code: ERROR_CODES.NETWORK_PARSE_ERROR,
      reason: "Feature has no source_fid or id",
    };
  }

  const geometry = toPathGeometry(feature.geometry);
  if (!geometry) {
    return {
      sourceFid,
      code: ERROR_CODES.MALFORMED_GEOMETRY,
      reason: `Feature ${sourceFid} is not a LineString or MultiLineString of numeric positions`,
    };
  }

  return {
    sourceFid,
    routeCode: readString(props, PROPERTY_KEYS.routeCode),
    name: readString(props, PROPERTY_KEYS.name),
    pathType: normalizePathType(readString(props, PROPERTY_KEYS.pathType)),
    area: readString(props, PROPERTY_KEYS.area),
    geometry,
  };
}

/**
 * Map known abbreviations to their legend label; keep anything else as-is.
 */
export function normalizePathType(value: string | null): string | null {
  if (!value) return null;
  return PATH_TYPE_ALIASES[value.trim().toLowerCase()] ?? value.trim();
}

// ============================================
// Import
// ============================================

/**
 * Parse a FeatureCollection and import it into the engine.
 *
 * Rejections from decoding and from engine validation are reported
 * together, keyed by the index of the source feature.
 */
export async function importNetworkGeoJson(
  engine: CoverageEngine,
  json: unknown,
  options: ImportNetworkOptions = {}
): Promise<NetworkImportResult> {
  const parsed = parseNetworkGeoJson(json);
  const result = await engine.importNetwork(parsed.paths, options);

  const rejected = [
    ...parsed.rejected,
    ...result.rejected.map((r) => ({
      ...r,
      index: parsed.featureIndexes[r.index] ?? r.index,
    })),
  ].sort((a, b) => a.index - b.index);

  return { ...result, rejected };
}

// ============================================
// Helpers
// ============================================

function isFeatureCollection(value: unknown): value is FeatureCollection {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "FeatureCollection" &&
    "features" in value &&
    Array.isArray(value.features)
  );
}

function isFeature(value: unknown): value is Feature {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "Feature"
  );
}

function readString(
  props: GeoJsonProperties,
  keys: readonly string[]
): string | null {
  if (!props) return null;

  for (const key of keys) {
    const actual = Object.keys(props).find((k) => k.toLowerCase() === key);
    if (actual === undefined) continue;

    const value: unknown = props[actual];
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    if (typeof value === "string" && value.trim() !== "") return value.trim();
  }
  return null;
}

function idToString(id: string | number | undefined): string | null {
  if (typeof id === "number") return String(id);
  if (typeof id === "string" && id.trim() !== "") return id.trim();
  return null;
}

function toPosition(value: unknown): Position | null {
  if (!Array.isArray(value) || value.length < 2) return null;
  const [lng, lat]: unknown[] = value;
  if (typeof lng !== "number" || typeof lat !== "number") return null;
  return [lng, lat];
}

function toLine(value: unknown): Position[] | null {
  if (!Array.isArray(value)) return null;
  const line: Position[] = [];
  for (const item of value) {
    const position = toPosition(item);
    if (!position) return null;
    line.push(position);
  }
  return line;
}

/**
 * Copy a GeoJSON geometry into a path geometry, dropping any Z values.
 */
function toPathGeometry(geometry: unknown): PathGeometry | null {
  if (typeof geometry !== "object" || geometry === null) return null;
  if (!("type" in geometry) || !("coordinates" in geometry)) return null;

  if (geometry.type === "LineString") {
    const coordinates = toLine(geometry.coordinates);
    return coordinates ? { type: "LineString", coordinates } : null;
  }

  if (geometry.type === "MultiLineString" && Array.isArray(geometry.coordinates)) {
    const coordinates: Position[][] = [];
    for (const part of geometry.coordinates) {
      const line = toLine(part);
      if (!line) return null;
      coordinates.push(line);
    }
    return { type: "MultiLineString", coordinates };
  }

  return null;
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Thrown when a network file as a whole cannot be decoded.
 * Problems with individual features are reported, not thrown.
 */
export class NetworkParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NetworkParseError";
  }
}
