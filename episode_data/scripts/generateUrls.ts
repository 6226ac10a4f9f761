#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { consola } from "consola";
import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import { KNOWN_SEASONS, URLS_FILE_NAME } from "./config.js";
import { buildEpisodeUrls, EPISODE_DATA_ROOT_DIRECTORY } from "./utils.js";

type CliOptions = {
  root: string;
  titlePrefix?: string;
  count?: number;
};

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return count;
}

async function main(season: string, options: CliOptions) {
  const known = KNOWN_SEASONS[season];
  const titlePrefix = options.titlePrefix ?? known?.titlePrefix;
  const count = options.count ?? known?.episodeCount;
  if (titlePrefix === undefined || count === undefined) {
    consola.fatal(`Unknown season '${season}', pass --title-prefix and --count`);
    process.exitCode = 1;
    return;
  }

  const urls = buildEpisodeUrls(titlePrefix, count);
  const seasonDirectory = path.resolve(options.root, season);
  const outputFile = path.join(seasonDirectory, URLS_FILE_NAME);

  consola.log(`Writing ${urls.length} URLs to ${outputFile}`);
  await mkdir(seasonDirectory, { recursive: true });
  await writeFile(outputFile, urls.join("\n") + "\n", "utf-8");
  consola.success("Successfully wrote URLs to file");
}

const program = new Command()
  .name("generate-urls")
  .description("Write urls.txt for a season whose articles are numbered 第N集")
  .argument("<season>", "season folder to write to")
  .option("--root <dir>", "directory holding the season folders", EPISODE_DATA_ROOT_DIRECTORY)
  .option("--title-prefix <prefix>", 'article title before "_第N集"')
  .option("--count <n>", "number of episodes", parseCount)
  .action(main);

program.parseAsync().catch((e) => {
  consola.fatal(e);
  process.exitCode = 1;
});
