import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ScheduleModule } from "@nestjs/schedule";
import { configSchema } from "./config/map.config";
import { JobsModule } from "./modules/jobs/jobs.module";
import { MapsModule } from "./modules/maps/maps.module";

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: configSchema,
    }),
    MapsModule,
    JobsModule,
  ],
})
export class AppModule {}
