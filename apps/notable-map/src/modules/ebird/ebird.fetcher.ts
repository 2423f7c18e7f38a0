import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  type FetchResult,
  type NotableQuery,
  type ObservationRecord,
  ObservationRecordSchema,
} from "./ebird.schema";

const FETCH_TIMEOUT_MS = 20_000;

@Injectable()
export class EBirdFetcher {
  private readonly logger = new Logger(EBirdFetcher.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Fetches recent notable observations within `radiusKm` of a point.
   *
   * Makes a single attempt and never throws: every failure comes back as
   * `{ ok: false, reason }`. The reason never contains the API token.
   */
  async fetchNotableNearby(query: NotableQuery): Promise<FetchResult> {
    const url = new URL(
      "/v2/data/obs/geo/recent/notable",
      this.configService.getOrThrow<string>("EBIRD_BASE_URL")
    );
    url.searchParams.set("lat", String(query.lat));
    url.searchParams.set("lng", String(query.lng));
    url.searchParams.set("dist", String(query.radiusKm));
    url.searchParams.set("back", String(query.backDays));
    url.searchParams.set("maxResults", String(query.maxResults));

    const token = this.configService.get<string>("EBIRD_TOKEN", "");
    if (!token) {
      this.logger.warn(
        "EBIRD_TOKEN is not set, eBird will likely reject the request"
      );
    }

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "X-eBirdApiToken": token },
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
      });
    } catch (err) {
      return this.fail(`Request to eBird failed: ${describeError(err)}`);
    }

    if (response.status === 403) {
      return this.fail(
        "eBird returned 403, the API token is missing or invalid"
      );
    }
    if (!response.ok) {
      return this.fail(
        `Failed to fetch observations: ${response.status} ${response.statusText}`
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      return this.fail(`eBird returned malformed JSON: ${describeError(err)}`);
    }
    if (!Array.isArray(payload)) {
      return this.fail("eBird returned a payload that is not a list");
    }

    const observations: ObservationRecord[] = [];
    let skipped = 0;
    for (const item of payload) {
      const parsed = ObservationRecordSchema.safeParse(item);
      if (parsed.success) {
        observations.push(parsed.data);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      this.logger.warn(
        `Skipped ${skipped} observations that failed validation`
      );
    }

    this.logger.log(`Fetched ${observations.length} observations`);
    return { ok: true, observations };
  }

  private fail(reason: string): FetchResult {
    this.logger.warn(reason);
    return { ok: false, reason };
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
