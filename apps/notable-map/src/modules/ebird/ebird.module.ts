import { Module } from "@nestjs/common";
import { EBirdFetcher } from "./ebird.fetcher";

@Module({
  providers: [EBirdFetcher],
  exports: [EBirdFetcher],
})
export class EBirdModule {}
