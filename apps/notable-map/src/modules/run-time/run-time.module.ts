import { Module } from "@nestjs/common";
import { RunTimeService } from "./run-time.service";

@Module({
  providers: [RunTimeService],
  exports: [RunTimeService],
})
export class RunTimeModule {}
