/**
 * Demo Module - Turns demo input into parsed event tables
 *
 * - ParsedDemoLoader reads a parser dump from disk
 * - ParserService sends a .dem file to the parser microservice
 */

import { Module } from "@nestjs/common";
import { ParsedDemoLoader } from "./parsed-demo.loader";
import { ParserService } from "./parser.service";

@Module({
  providers: [ParsedDemoLoader, ParserService],
  exports: [ParsedDemoLoader, ParserService],
})
export class DemoModule {}
