import { Module } from "@nestjs/common";
import { TransformerModule } from "./transformers";
import { ExtractionService } from "./extraction.service";
import { ExtractionConfigService } from "../../common/config";

@Module({
  imports: [TransformerModule],
  providers: [ExtractionService, ExtractionConfigService],
  exports: [ExtractionService, ExtractionConfigService],
})
export class ExtractionModule {}
