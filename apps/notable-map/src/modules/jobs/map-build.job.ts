import { Injectable, Logger } from "@nestjs/common";
import { Cron } from "@nestjs/schedule";
import { MAP_TIMEZONE } from "../../config/map.config";
import { MapBuilderService } from "../maps/map-builder.service";
import type { RunSlot } from "../run-time/run-time.schema";
import { RunTimeService } from "../run-time/run-time.service";

@Injectable()
export class MapBuildJob {
  private readonly logger = new Logger(MapBuildJob.name);

  constructor(
    private readonly builder: MapBuilderService,
    private readonly runTime: RunTimeService
  ) {}

  @Cron("0 12 * * *", { name: "map-build-midday", timeZone: MAP_TIMEZONE })
  async runMidday() {
    await this.run("midday");
  }

  @Cron("0 18 * * *", { name: "map-build-evening", timeZone: MAP_TIMEZONE })
  async runEvening() {
    await this.run("evening");
  }

  /**
   * Builds for today's date and the given slot so the file name carries the
   * slot time rather than whenever the cron tick happened to land.
   */
  async run(slot: RunSlot) {
    const date = this.runTime.today();
    this.logger.debug(`Starting ${slot} map build for ${date}`);

    try {
      const outcome = await this.builder.build({
        runOverride: { date, slot },
      });
      this.logger.log(
        `Published ${outcome.outfile} (${outcome.recordCount} records, ${outcome.speciesCount} species)`
      );
    } catch (err) {
      this.logger.error(`Scheduled ${slot} map build failed: ${err}`);
    }
  }
}
