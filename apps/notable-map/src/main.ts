import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { MapBuilderService } from "./modules/maps/map-builder.service";

async function bootstrap() {
  const logger = new Logger("Bootstrap");
  const app = await NestFactory.createApplicationContext(AppModule);

  if (app.get(ConfigService).get<boolean>("SCHEDULE_ENABLED")) {
    logger.log(
      "Scheduled builds enabled, waiting for the midday and evening slots"
    );
    return;
  }

  // One-shot mode: build, publish, exit
  try {
    const outcome = await app.get(MapBuilderService).build();
    logger.log(
      `Published ${outcome.outfile} (${outcome.strategy}, ${outcome.speciesCount} species, removed ${outcome.removed} old maps)`
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  new Logger("Bootstrap").error(`Map build failed: ${err}`);
  process.exitCode = 1;
});
