import { Injectable } from "@nestjs/common";
import type { ObservationRecord } from "../ebird/ebird.schema";
import {
  type AggregatedObservations,
  CHECKLIST_URL_BASE,
  type SightingDetail,
  UNKNOWN_LOCATION,
  UNKNOWN_SPECIES,
} from "./observations.schema";

/**
 * Locations only merge on exact coordinate equality. Two checklists a few
 * meters apart stay separate markers.
 */
export function locationKey(lat: number, lng: number): string {
  return `${lat},${lng}`;
}

@Injectable()
export class ObservationAggregator {
  private toDetail(record: ObservationRecord): SightingDetail {
    return {
      locationName: record.locName || UNKNOWN_LOCATION,
      observedAt: record.obsDt ?? undefined,
      count: record.howMany ?? undefined,
      checklistUrl: record.subId
        ? `${CHECKLIST_URL_BASE}${record.subId}`
        : undefined,
    };
  }

  aggregate(records: readonly ObservationRecord[]): AggregatedObservations {
    const result: AggregatedObservations = {
      locations: new Map(),
      species: new Set(),
    };

    for (const record of records) {
      const speciesName = record.comName || UNKNOWN_SPECIES;
      result.species.add(speciesName);

      const key = locationKey(record.lat, record.lng);
      let location = result.locations.get(key);
      if (!location) {
        location = { lat: record.lat, lng: record.lng, species: new Map() };
        result.locations.set(key, location);
      }

      let details = location.species.get(speciesName);
      if (!details) {
        details = [];
        location.species.set(speciesName, details);
      }
      // no dedup: a repeated record in the feed shows up twice
      details.push(this.toDetail(record));
    }

    return result;
  }

  countSightings(aggregated: AggregatedObservations): number {
    let total = 0;
    for (const location of aggregated.locations.values()) {
      for (const details of location.species.values()) {
        total += details.length;
      }
    }
    return total;
  }
}
