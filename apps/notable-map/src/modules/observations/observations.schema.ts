export const UNKNOWN_SPECIES = "Unknown";
export const UNKNOWN_LOCATION = "Unknown location";
export const CHECKLIST_URL_BASE = "https://ebird.org/checklist/";

export interface SightingDetail {
  locationName: string;
  /** Passed through exactly as the feed reported it. */
  observedAt?: string;
  count?: number;
  checklistUrl?: string;
}

/** Sightings reported at one exact coordinate pair, keyed by species. */
export interface LocationGroup {
  lat: number;
  lng: number;
  species: Map<string, SightingDetail[]>;
}

export interface AggregatedObservations {
  locations: Map<string, LocationGroup>;
  species: Set<string>;
}

export type LayerStrategy = "per-species" | "combined";
