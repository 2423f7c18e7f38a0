import { Logger } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import type { MapBuilderService } from "../../maps/map-builder.service";
import type { RunTimeService } from "../../run-time/run-time.service";
import { MapBuildJob } from "../map-build.job";

describe("MapBuildJob", () => {
  let job: MapBuildJob;
  let loggerErrorSpy: jest.SpyInstance;

  const builderMock = {
    build: jest.fn(),
  };

  const runTimeMock = {
    today: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        {
          provide: MapBuildJob,
          useFactory: () =>
            new MapBuildJob(
              builderMock as unknown as MapBuilderService,
              runTimeMock as unknown as RunTimeService
            ),
        },
      ],
    }).compile();

    job = module.get<MapBuildJob>(MapBuildJob);
    loggerErrorSpy = jest.spyOn(Logger.prototype, "error").mockImplementation();
    jest.spyOn(Logger.prototype, "log").mockImplementation();
    jest.spyOn(Logger.prototype, "debug").mockImplementation();
    jest.clearAllMocks();
    runTimeMock.today.mockReturnValue("2026-10-19");
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("builds the midday slot for today", async () => {
    builderMock.build.mockResolvedValue({
      outfile: "/tmp/maps/ebird_radius_map_2026-10-19_12-00-00_10km.html",
      recordCount: 4,
      speciesCount: 3,
    });

    await job.runMidday();

    expect(builderMock.build).toHaveBeenCalledWith({
      runOverride: { date: "2026-10-19", slot: "midday" },
    });
  });

  it("builds the evening slot for today", async () => {
    builderMock.build.mockResolvedValue({
      outfile: "/tmp/maps/ebird_radius_map_2026-10-19_18-00-00_10km.html",
      recordCount: 0,
      speciesCount: 0,
    });

    await job.runEvening();

    expect(builderMock.build).toHaveBeenCalledWith({
      runOverride: { date: "2026-10-19", slot: "evening" },
    });
  });

  it("logs a failed build instead of throwing", async () => {
    builderMock.build.mockRejectedValue(new Error("disk full"));

    await expect(job.run("midday")).resolves.toBeUndefined();
    expect(loggerErrorSpy).toHaveBeenCalledWith(
      "Scheduled midday map build failed: Error: disk full"
    );
  });
});
