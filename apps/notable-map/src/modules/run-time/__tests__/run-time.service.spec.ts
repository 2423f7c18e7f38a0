import { Logger } from "@nestjs/common";
import { DateTime } from "luxon";
import { mockConfigService } from "../../../testing/config-service.mock";
import { RunTimeService } from "../run-time.service";

describe("RunTimeService", () => {
  // 12:30:05 in New York (EDT)
  const fixedNow = () => DateTime.fromISO("2026-10-19T16:30:05Z");
  let loggerWarnSpy: jest.SpyInstance;

  beforeEach(() => {
    loggerWarnSpy = jest.spyOn(Logger.prototype, "warn").mockImplementation();
  });

  afterEach(() => {
    loggerWarnSpy.mockRestore();
  });

  function serviceWith(values: Record<string, unknown>) {
    return new RunTimeService(mockConfigService(values), fixedNow);
  }

  it("uses the current time in the map time zone without an override", () => {
    const runTime = serviceWith({}).resolve();

    expect(runTime.mode).toBe("now");
    expect(runTime.slot).toBeUndefined();
    expect(runTime.fileSafe).toBe("2026-10-19_12-30-05");
    expect(runTime.display).toBe("2026-10-19 12:30 EDT");
    expect(runTime.instant.zoneName).toBe("America/New_York");
  });

  it("pins a configured date and slot to the slot hour", () => {
    const runTime = serviceWith({
      RUN_DATE: "2026-10-17",
      RUN_SLOT: "evening",
    }).resolve();

    expect(runTime.mode).toBe("scheduled");
    expect(runTime.slot).toBe("evening");
    expect(runTime.fileSafe).toBe("2026-10-17_18-00-00");
    expect(runTime.display).toBe("2026-10-17 18:00 EDT");
    expect(runTime.instant.toISO()).toBe("2026-10-17T18:00:00.000-04:00");
  });

  it("accepts an explicit override over configuration", () => {
    const runTime = serviceWith({
      RUN_DATE: "2026-10-17",
      RUN_SLOT: "evening",
    }).resolve({ date: "2026-01-15", slot: "Midday" });

    expect(runTime.fileSafe).toBe("2026-01-15_12-00-00");
    expect(runTime.display).toBe("2026-01-15 12:00 EST");
  });

  it("falls back to now for an unknown slot", () => {
    const runTime = serviceWith({
      RUN_DATE: "2026-10-17",
      RUN_SLOT: "midnight",
    }).resolve();

    expect(runTime.mode).toBe("now");
    expect(runTime.fileSafe).toBe("2026-10-19_12-30-05");
    expect(loggerWarnSpy).toHaveBeenCalledWith(
      'Ignoring run override: unknown slot "midnight", expected one of midday, evening'
    );
  });

  it("falls back to now for an unparsable date", () => {
    const runTime = serviceWith({
      RUN_DATE: "2026-02-30",
      RUN_SLOT: "midday",
    }).resolve();

    expect(runTime.mode).toBe("now");
    expect(runTime.fileSafe).toBe("2026-10-19_12-30-05");
    expect(loggerWarnSpy).toHaveBeenCalledWith(
      'Ignoring run override: "2026-02-30" is not a yyyy-MM-dd date'
    );
  });

  it("falls back to now when only half of the override is set", () => {
    const runTime = serviceWith({ RUN_SLOT: "midday" }).resolve();

    expect(runTime.mode).toBe("now");
    expect(loggerWarnSpy).toHaveBeenCalledWith(
      "Ignoring run override: both RUN_DATE and RUN_SLOT are required"
    );
  });

  it("derives display and file names from the same instant", () => {
    const clock = jest
      .fn()
      .mockReturnValueOnce(DateTime.fromISO("2026-10-19T16:30:05Z"))
      .mockReturnValueOnce(DateTime.fromISO("2026-10-19T16:31:59Z"));
    const service = new RunTimeService(mockConfigService({}), clock);

    const runTime = service.resolve();

    expect(clock).toHaveBeenCalledTimes(1);
    expect(runTime.display).toBe("2026-10-19 12:30 EDT");
    expect(runTime.fileSafe).toBe("2026-10-19_12-30-05");
  });

  it("reports today's date in the map time zone", () => {
    // 02:00 UTC is still the previous evening in New York
    const service = new RunTimeService(mockConfigService({}), () =>
      DateTime.fromISO("2026-10-20T02:00:00Z")
    );

    expect(service.today()).toBe("2026-10-19");
  });
});
