#!/usr/bin/env node
import { Command } from "commander";
import { consola } from "consola";
import { generateSeasonPdfs, type GenerateOptions } from "./generateSeasonPdfs.js";
import { EPISODE_DATA_ROOT_DIRECTORY } from "./utils.js";

const program = new Command()
  .name("generate-pdfs")
  .description("Generate PDFs from Pokémon episode summaries")
  .argument("<season>", 'season folder to process (e.g. "1997" or "advanced_generation")')
  .option("--root <dir>", "directory holding the season folders", EPISODE_DATA_ROOT_DIRECTORY)
  .action(async (season: string, options: GenerateOptions) => {
    process.exitCode = await generateSeasonPdfs(season, options);
  });

program.parseAsync().catch((e) => {
  consola.fatal(e);
  process.exitCode = 1;
});
