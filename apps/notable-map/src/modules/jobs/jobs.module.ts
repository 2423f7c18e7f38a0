import { Module } from "@nestjs/common";
import { MapsModule } from "../maps/maps.module";
import { RunTimeModule } from "../run-time/run-time.module";
import { MapBuildJob } from "./map-build.job";

@Module({
  imports: [MapsModule, RunTimeModule],
  providers: [MapBuildJob],
})
export class JobsModule {}
