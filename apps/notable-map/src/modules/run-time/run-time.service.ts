import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { DateTime } from "luxon";
import { MAP_TIMEZONE } from "../../config/map.config";
import {
  type Clock,
  DISPLAY_FORMAT,
  FILE_SAFE_FORMAT,
  isRunSlot,
  RUN_CLOCK,
  RUN_DATE_FORMAT,
  RUN_SLOTS,
  type RunOverride,
  type RunSlot,
  type RunTime,
} from "./run-time.schema";

@Injectable()
export class RunTimeService {
  private readonly logger = new Logger(RunTimeService.name);
  private readonly clock: Clock;

  constructor(
    private readonly configService: ConfigService,
    @Optional() @Inject(RUN_CLOCK) clock?: Clock
  ) {
    this.clock = clock ?? (() => DateTime.now());
  }

  /**
   * Resolves the timestamp for this run. A date plus a known slot pins the
   * instant to that slot's hour; anything else means "now". Display and
   * file names are both derived from the single resolved instant.
   */
  resolve(override: RunOverride = this.configuredOverride()): RunTime {
    const scheduled = this.resolveScheduled(override);
    const instant = scheduled?.instant ?? this.now();

    return {
      instant,
      display: instant.setLocale("en-US").toFormat(DISPLAY_FORMAT),
      fileSafe: instant.toFormat(FILE_SAFE_FORMAT),
      mode: scheduled ? "scheduled" : "now",
      slot: scheduled?.slot,
    };
  }

  /** Today's calendar date in the map time zone, as a run override date. */
  today(): string {
    return this.now().toFormat(RUN_DATE_FORMAT);
  }

  private now(): DateTime {
    return this.clock().setZone(MAP_TIMEZONE);
  }

  private configuredOverride(): RunOverride {
    return {
      date: this.configService.get<string>("RUN_DATE"),
      slot: this.configService.get<string>("RUN_SLOT"),
    };
  }

  private resolveScheduled(
    override: RunOverride
  ): { instant: DateTime; slot: RunSlot } | null {
    const date = override.date?.trim() ?? "";
    const slot = override.slot?.trim().toLowerCase() ?? "";
    if (!date && !slot) return null;

    if (!date || !slot) {
      this.logger.warn(
        "Ignoring run override: both RUN_DATE and RUN_SLOT are required"
      );
      return null;
    }
    if (!isRunSlot(slot)) {
      this.logger.warn(
        `Ignoring run override: unknown slot "${slot}", expected one of ${Object.keys(RUN_SLOTS).join(", ")}`
      );
      return null;
    }

    const day = DateTime.fromFormat(date, RUN_DATE_FORMAT, {
      zone: MAP_TIMEZONE,
    });
    if (!day.isValid) {
      this.logger.warn(
        `Ignoring run override: "${date}" is not a ${RUN_DATE_FORMAT} date`
      );
      return null;
    }

    return {
      instant: day.set({
        hour: RUN_SLOTS[slot],
        minute: 0,
        second: 0,
        millisecond: 0,
      }),
      slot,
    };
  }
}
