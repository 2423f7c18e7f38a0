import { DateTime } from "luxon";
import { FILE_SAFE_FORMAT } from "../run-time/run-time.schema";

export const ARTIFACT_PREFIX = "ebird_radius_map_";
export const ARTIFACT_EXTENSION = ".html";
export const LATEST_FILE = `latest${ARTIFACT_EXTENSION}`;

const ARTIFACT_PATTERN =
  /^ebird_radius_map_(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})(?:_(.+))?\.html$/;

export interface ArchiveArtifact {
  name: string;
  /** Wall-clock stamp from the name, compared as UTC so order matches the name. */
  stamp: DateTime;
  suffix?: string;
}

export interface PruneFailure {
  name: string;
  reason: string;
}

export type PruneResult =
  | {
      kind: "pruned";
      kept: string[];
      attempted: string[];
      failed: PruneFailure[];
    }
  | { kind: "unreadable"; reason: string };

export interface PublishResult {
  outfile: string;
  latestPath: string;
  latestUpdated: boolean;
  removed: number;
}

export function artifactFileName(fileSafe: string, radiusKm: number): string {
  return `${ARTIFACT_PREFIX}${fileSafe}_${radiusKm}km${ARTIFACT_EXTENSION}`;
}

export function parseArtifactName(name: string): ArchiveArtifact | null {
  const match = ARTIFACT_PATTERN.exec(name);
  if (!match) return null;

  const stamp = DateTime.fromFormat(match[1], FILE_SAFE_FORMAT, {
    zone: "utc",
  });
  if (!stamp.isValid) return null;

  return { name, stamp, suffix: match[2] };
}

/** Newest first; equal stamps fall back to descending name. */
export function compareNewestFirst(
  a: ArchiveArtifact,
  b: ArchiveArtifact
): number {
  const byStamp = b.stamp.toMillis() - a.stamp.toMillis();
  if (byStamp !== 0) return byStamp;
  if (a.name === b.name) return 0;
  return a.name > b.name ? -1 : 1;
}
