import { Module } from "@nestjs/common";
import { ArchiveModule } from "../archive/archive.module";
import { EBirdModule } from "../ebird/ebird.module";
import { ObservationsModule } from "../observations/observations.module";
import { RunTimeModule } from "../run-time/run-time.module";
import { LeafletHtmlRenderer } from "./leaflet-html.renderer";
import { MAP_RENDERER } from "./map.renderer";
import { MapBuilderService } from "./map-builder.service";

@Module({
  imports: [EBirdModule, ObservationsModule, RunTimeModule, ArchiveModule],
  providers: [
    MapBuilderService,
    { provide: MAP_RENDERER, useClass: LeafletHtmlRenderer },
  ],
  exports: [MapBuilderService],
})
export class MapsModule {}
