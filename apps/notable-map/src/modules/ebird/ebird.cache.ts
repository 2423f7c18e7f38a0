import { Logger } from "@nestjs/common";
import type {
  NotableFetch,
  NotableQuery,
  ObservationRecord,
} from "./ebird.schema";

/**
 * Memoizes notable-observation lookups for the lifetime of one cache object.
 *
 * Keys round coordinates to 6 decimals and truncate radius and window to
 * integers. Entries never expire. A failed fetch is cached as an empty list,
 * the same as a window with no notable sightings.
 */
export class ObservationCache {
  private readonly logger = new Logger(ObservationCache.name);
  private readonly entries = new Map<string, Promise<ObservationRecord[]>>();

  constructor(
    private readonly fetchNotable: NotableFetch,
    private readonly maxResults: number
  ) {}

  static keyFor(
    lat: number,
    lng: number,
    radiusKm: number,
    backDays: number
  ): string {
    return [
      roundTo6(lat),
      roundTo6(lng),
      Math.trunc(radiusKm),
      Math.trunc(backDays),
    ].join(":");
  }

  get size(): number {
    return this.entries.size;
  }

  get(
    lat: number,
    lng: number,
    radiusKm: number,
    backDays: number
  ): Promise<ObservationRecord[]> {
    const key = ObservationCache.keyFor(lat, lng, radiusKm, backDays);
    const cached = this.entries.get(key);
    if (cached) return cached;

    const pending = this.load({
      lat,
      lng,
      radiusKm: Math.trunc(radiusKm),
      backDays: Math.trunc(backDays),
      maxResults: this.maxResults,
    });
    this.entries.set(key, pending);
    return pending;
  }

  private async load(query: NotableQuery): Promise<ObservationRecord[]> {
    try {
      const result = await this.fetchNotable(query);
      if (result.ok) return result.observations;
      this.logger.warn(`No observations for this window: ${result.reason}`);
    } catch (err) {
      this.logger.error(`Observation fetch threw unexpectedly: ${err}`);
    }
    return [];
  }
}

function roundTo6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}
