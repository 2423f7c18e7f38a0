import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ConfigService } from "@nestjs/config";
import * as Joi from "joi";

/** Civil time zone used for timestamps, run slots and the cron schedule. */
export const MAP_TIMEZONE = "America/New_York";

export const MAP_DEFAULTS = {
  outputDir: join(tmpdir(), "bird_maps"),
  keepCount: 30,
  ebirdBaseUrl: "https://api.ebird.org/",
  centerLat: 42.3974042,
  centerLon: -71.1366337,
  radiusKm: 10,
  backDays: 2,
  maxResults: 200,
  zoomStart: 11,
  // above this many species everything goes into a single layer
  speciesLayerThreshold: 25,
} as const;

export const configSchema = Joi.object({
  OUTPUT_DIR: Joi.string().optional().default(MAP_DEFAULTS.outputDir),
  KEEP_COUNT: Joi.number().integer().optional().default(MAP_DEFAULTS.keepCount),
  EBIRD_TOKEN: Joi.string().allow("").optional().default(""),
  EBIRD_BASE_URL: Joi.string()
    .uri()
    .optional()
    .default(MAP_DEFAULTS.ebirdBaseUrl),
  CENTER_LAT: Joi.number()
    .min(-90)
    .max(90)
    .optional()
    .default(MAP_DEFAULTS.centerLat),
  CENTER_LON: Joi.number()
    .min(-180)
    .max(180)
    .optional()
    .default(MAP_DEFAULTS.centerLon),
  RADIUS_KM: Joi.number().positive().optional().default(MAP_DEFAULTS.radiusKm),
  BACK_DAYS: Joi.number()
    .integer()
    .min(1)
    .max(30)
    .optional()
    .default(MAP_DEFAULTS.backDays),
  MAX_RESULTS: Joi.number()
    .integer()
    .min(1)
    .max(10000)
    .optional()
    .default(MAP_DEFAULTS.maxResults),
  ZOOM_START: Joi.number()
    .integer()
    .min(1)
    .max(18)
    .optional()
    .default(MAP_DEFAULTS.zoomStart),
  SPECIES_LAYER_THRESHOLD: Joi.number()
    .integer()
    .min(0)
    .optional()
    .default(MAP_DEFAULTS.speciesLayerThreshold),
  // free text, RunTimeService falls back to "now" on a bad value
  RUN_DATE: Joi.string().allow("").optional(),
  RUN_SLOT: Joi.string().allow("").optional(),
  SCHEDULE_ENABLED: Joi.boolean().optional().default(false),
});

export interface MapSettings {
  outputDir: string;
  keepCount: number;
  centerLat: number;
  centerLon: number;
  radiusKm: number;
  backDays: number;
  maxResults: number;
  zoomStart: number;
  speciesLayerThreshold: number;
}

export function readMapSettings(configService: ConfigService): MapSettings {
  return {
    outputDir: configService.get<string>("OUTPUT_DIR", MAP_DEFAULTS.outputDir),
    keepCount: configService.get<number>("KEEP_COUNT", MAP_DEFAULTS.keepCount),
    centerLat: configService.get<number>("CENTER_LAT", MAP_DEFAULTS.centerLat),
    centerLon: configService.get<number>("CENTER_LON", MAP_DEFAULTS.centerLon),
    radiusKm: configService.get<number>("RADIUS_KM", MAP_DEFAULTS.radiusKm),
    backDays: configService.get<number>("BACK_DAYS", MAP_DEFAULTS.backDays),
    maxResults: configService.get<number>(
      "MAX_RESULTS",
      MAP_DEFAULTS.maxResults
    ),
    zoomStart: configService.get<number>("ZOOM_START", MAP_DEFAULTS.zoomStart),
    speciesLayerThreshold: configService.get<number>(
      "SPECIES_LAYER_THRESHOLD",
      MAP_DEFAULTS.speciesLayerThreshold
    ),
  };
}
