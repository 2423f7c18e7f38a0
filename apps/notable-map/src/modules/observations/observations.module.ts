import { Module } from "@nestjs/common";
import { ObservationAggregator } from "./observation.aggregator";
import { SpeciesColorizer } from "./species.colorizer";

@Module({
  providers: [ObservationAggregator, SpeciesColorizer],
  exports: [ObservationAggregator, SpeciesColorizer],
})
export class ObservationsModule {}
