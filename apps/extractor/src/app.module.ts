/**
 * Match Insights - Root Application Module
 */

import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { validateEnvironment } from "./common/config";
import { DemoModule } from "./modules/demo";
import { ExtractionModule } from "./modules/extraction";
import { ExportModule } from "./modules/export";
import { ReportModule } from "./modules/report";
import { CliRunner } from "./cli/cli.runner";

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      validate: validateEnvironment,
    }),

    // Feature modules
    DemoModule,
    ExtractionModule,
    ExportModule,
    ReportModule,
  ],
  providers: [CliRunner],
})
export class AppModule {}
