import { copyFile, mkdir, readdir, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { readMapSettings } from "../../config/map.config";
import {
  type ArchiveArtifact,
  artifactFileName,
  compareNewestFirst,
  LATEST_FILE,
  parseArtifactName,
  type PruneFailure,
  type PruneResult,
  type PublishResult,
} from "./archive.schema";

@Injectable()
export class ArchiveService {
  private readonly logger = new Logger(ArchiveService.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Writes a new timestamped map, points `latest.html` at it, then prunes
   * the archive down to KEEP_COUNT.
   */
  async publish(
    html: string,
    fileSafe: string,
    radiusKm: number
  ): Promise<PublishResult> {
    const { outputDir, keepCount } = readMapSettings(this.configService);
    await mkdir(outputDir, { recursive: true });

    const outfile = join(outputDir, artifactFileName(fileSafe, radiusKm));
    await writeFile(outfile, html, "utf8");
    this.logger.log(`Map saved as '${outfile}'`);

    const latestPath = join(outputDir, LATEST_FILE);
    let latestUpdated = false;
    try {
      await copyFile(outfile, latestPath);
      latestUpdated = true;
      this.logger.log(`Updated '${latestPath}'`);
    } catch (err) {
      this.logger.warn(`Failed to update '${latestPath}': ${err}`);
    }

    const removed = await this.prune(outputDir, keepCount);
    this.logger.log(`Archive pruning - kept ${keepCount}, removed ${removed}`);

    return { outfile, latestPath, latestUpdated, removed };
  }

  /** Returns how many artifacts were scheduled for removal. */
  async prune(directory: string, keep: number): Promise<number> {
    const result = await this.pruneDetailed(directory, keep);
    return result.kind === "pruned" ? result.attempted.length : 0;
  }

  /**
   * Keeps the `keep` newest timestamped artifacts and deletes the rest.
   * `latest.html` and files that don't follow the naming scheme are never
   * touched. A failed delete is recorded and the batch carries on.
   */
  async pruneDetailed(directory: string, keep: number): Promise<PruneResult> {
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (err) {
      this.logger.warn(`Cannot list archive '${directory}': ${err}`);
      return { kind: "unreadable", reason: String(err) };
    }

    const artifacts = names
      .filter((name) => name !== LATEST_FILE)
      .map((name) => parseArtifactName(name))
      .filter((artifact): artifact is ArchiveArtifact => artifact !== null)
      .sort(compareNewestFirst);

    const limit = Math.max(0, Math.trunc(keep));
    const kept = artifacts.slice(0, limit).map((artifact) => artifact.name);
    const attempted = artifacts.slice(limit).map((artifact) => artifact.name);

    const failed: PruneFailure[] = [];
    for (const name of attempted) {
      try {
        await unlink(join(directory, name));
      } catch (err) {
        failed.push({ name, reason: String(err) });
        this.logger.warn(`Failed to remove archived map '${name}': ${err}`);
      }
    }

    return { kind: "pruned", kept, attempted, failed };
  }
}
