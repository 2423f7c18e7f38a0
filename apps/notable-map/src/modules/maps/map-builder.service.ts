import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { readMapSettings } from "../../config/map.config";
import { ArchiveService } from "../archive/archive.service";
import { ObservationCache } from "../ebird/ebird.cache";
import { EBirdFetcher } from "../ebird/ebird.fetcher";
import { selectLayerStrategy } from "../observations/layer-strategy";
import { ObservationAggregator } from "../observations/observation.aggregator";
import type { LayerStrategy } from "../observations/observations.schema";
import { SpeciesColorizer } from "../observations/species.colorizer";
import type { RunOverride, RunTime } from "../run-time/run-time.schema";
import { RunTimeService } from "../run-time/run-time.service";
import {
  buildRadiusRings,
  MAP_RENDERER,
  type MapRenderer,
} from "./map.renderer";

export const EMPTY_NOTICE = "No current notable birds for the selected window.";

export interface BuildRequest {
  lat?: number;
  lng?: number;
  radiusKm?: number;
  backDays?: number;
  zoom?: number;
  runOverride?: RunOverride;
}

export interface BuildOutcome {
  outfile: string;
  latestPath: string;
  removed: number;
  recordCount: number;
  speciesCount: number;
  strategy: LayerStrategy;
  runTime: RunTime;
}

@Injectable()
export class MapBuilderService {
  private readonly logger = new Logger(MapBuilderService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly fetcher: EBirdFetcher,
    private readonly aggregator: ObservationAggregator,
    private readonly colorizer: SpeciesColorizer,
    private readonly runTime: RunTimeService,
    private readonly archive: ArchiveService,
    @Inject(MAP_RENDERER) private readonly renderer: MapRenderer
  ) {}

  /** A fresh cache; pass the same one to several builds to share lookups. */
  createCache(): ObservationCache {
    return new ObservationCache(
      (query) => this.fetcher.fetchNotableNearby(query),
      readMapSettings(this.configService).maxResults
    );
  }

  async build(
    request: BuildRequest = {},
    cache: ObservationCache = this.createCache()
  ): Promise<BuildOutcome> {
    const settings = readMapSettings(this.configService);
    const lat = request.lat ?? settings.centerLat;
    const lng = request.lng ?? settings.centerLon;
    const radiusKm = request.radiusKm ?? settings.radiusKm;
    const backDays = request.backDays ?? settings.backDays;

    const runTime = this.runTime.resolve(request.runOverride);
    const records = await cache.get(lat, lng, radiusKm, backDays);
    this.logger.log(
      `Building map for ${runTime.display} from ${records.length} records`
    );

    const observations = this.aggregator.aggregate(records);
    const colors = this.colorizer.buildColorTable(observations.species);
    const strategy = selectLayerStrategy(
      colors.size,
      settings.speciesLayerThreshold
    );

    const html = this.renderer.render({
      title: `eBird Notable - ${radiusKm} km radius - last ${backDays} day(s)`,
      subtitle: `Updated ${runTime.display}`,
      center: { lat, lng },
      zoom: request.zoom ?? settings.zoomStart,
      rings: buildRadiusRings(radiusKm),
      colors,
      observations,
      strategy,
      notice: records.length === 0 ? EMPTY_NOTICE : undefined,
    });

    const published = await this.archive.publish(
      html,
      runTime.fileSafe,
      radiusKm
    );

    return {
      outfile: published.outfile,
      latestPath: published.latestPath,
      removed: published.removed,
      recordCount: records.length,
      speciesCount: colors.size,
      strategy,
      runTime,
    };
  }
}
