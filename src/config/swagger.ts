/**
 * OpenAPI/Swagger Configuration
 * Defines the OpenAPI document and the reusable schemas
 *
 * Paths come from the @openapi blocks in src/routes/*.ts.
 */

import swaggerJsdoc from "swagger-jsdoc";
import { API } from "./constants.js";

const statsBucket = {
  type: "object",
  properties: {
    count: { type: "integer" },
    length_km: { type: "number" },
    ridden_count: { type: "integer" },
    ridden_length_km: { type: "number" },
    not_ridden_count: { type: "integer" },
    not_ridden_length_km: { type: "number" },
  },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: "3.1.0",
    info: {
      title: "Bridleway Log API",
      version: "1.0.0",
      description: `
# Bridleway Log API

Tracks which paths of a rights-of-way network have been ridden, from uploaded GPX traces.

## Workflow

1. Import the path network: \`POST /network/import\` with a GeoJSON FeatureCollection
2. Upload rides: \`POST /rides\` with one or more GPX files in the \`gpx\` field
3. Read coverage: \`GET /paths\` (GeoJSON) and \`GET /stats\`

Coverage is recomputed on every upload, deletion and import. Reads always
return the last committed state.
      `,
      license: {
        name: "MIT",
      },
    },
    servers: [
      {
        url: `http://localhost:3000${API.PREFIX}`,
        description: "Development server",
      },
    ],
    tags: [
      { name: "Paths", description: "Path network with coverage" },
      { name: "Stats", description: "Coverage statistics" },
      { name: "Rides", description: "GPX ride upload and management" },
      { name: "Network", description: "Path network import" },
    ],
    components: {
      schemas: {
        ApiErrorResponse: {
          type: "object",
          required: ["success", "error"],
          properties: {
            success: { type: "boolean", enum: [false] },
            error: {
              type: "string",
              description: "Human-readable error message",
            },
            code: {
              type: "string",
              description: "Machine-readable error code",
            },
          },
          example: {
            success: false,
            error: "Ride not found: 1b4e28ba-2fa1-11d2-883f-0016d3cca427",
            code: "RIDE_NOT_FOUND",
          },
        },

        StatsBucket: statsBucket,

        StatsResponse: {
          type: "object",
          properties: {
            total_paths: { type: "integer" },
            total_length_km: { type: "number" },
            ridden_paths: { type: "integer" },
            ridden_length_km: { type: "number", description: "Length-weighted: partial coverage counts partially" },
            not_ridden_paths: { type: "integer" },
            not_ridden_length_km: { type: "number" },
            percent_ridden: { type: "number", description: "Ridden length as a percentage of total length" },
            by_type: {
              type: "object",
              additionalProperties: { $ref: "#/components/schemas/StatsBucket" },
            },
            by_area: {
              type: "object",
              additionalProperties: { $ref: "#/components/schemas/StatsBucket" },
            },
          },
        },
      },
    },
  },
  apis: ["./src/routes/*.ts"],
};

export const swaggerSpec = swaggerJsdoc(options);
