import { z } from "zod";

/**
 * One record from the notable-observations-by-geo endpoint. Only the
 * coordinates are required; everything the map shows has a fallback.
 */
export const ObservationRecordSchema = z.object({
  speciesCode: z.string().nullish(),
  comName: z.string().nullish(),
  sciName: z.string().nullish(),
  locId: z.string().nullish(),
  locName: z.string().nullish(),
  obsDt: z.string().nullish(),
  howMany: z.number().nullish(),
  lat: z.number().finite(),
  lng: z.number().finite(),
  obsValid: z.boolean().nullish(),
  obsReviewed: z.boolean().nullish(),
  locationPrivate: z.boolean().nullish(),
  subId: z.string().nullish(),
});

export type ObservationRecord = z.infer<typeof ObservationRecordSchema>;

export interface NotableQuery {
  lat: number;
  lng: number;
  radiusKm: number;
  backDays: number;
  maxResults: number;
}

export type FetchResult =
  | { ok: true; observations: ObservationRecord[] }
  | { ok: false; reason: string };

export type NotableFetch = (query: NotableQuery) => Promise<FetchResult>;
