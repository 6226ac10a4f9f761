import { consola } from "consola";
import { existsSync } from "fs";
import { mkdir } from "fs/promises";
import * as path from "path";
import {
  fontCandidates,
  PDF_DIRECTORY_NAME,
  URLS_FILE_NAME,
  type FontCandidate,
} from "./config.js";
import { createScriptConverter } from "./convertScript.js";
import { EpisodePageFetcher, type EpisodePageSource } from "./fetchEpisodePage.js";
import { loadSectionHeadings } from "./parseEpisode.js";
import {
  loadableFont,
  renderEpisodeBatch,
  resolveChineseFont,
  type FontCheck,
  type ResolvedFont,
} from "./renderEpisodes.js";
import { runPipeline } from "./runPipeline.js";
import { readUrlList } from "./utils.js";

export type GenerateOptions = {
  root: string;
};

export type GenerateDependencies = {
  source?: EpisodePageSource;
  fonts?: readonly FontCandidate[];
  fontCheck?: FontCheck;
};

/**
 * Generates every PDF of a season and returns the process exit code: 1 when the
 * run cannot start, 0 otherwise, even if some episodes or batches failed.
 */
export async function generateSeasonPdfs(
  season: string,
  options: GenerateOptions,
  dependencies: GenerateDependencies = {}
): Promise<number> {
  const seasonDirectory = path.resolve(options.root, season);
  const seasonName = path.basename(seasonDirectory);
  consola.start(`Generating PDFs for ${seasonName}`);

  if (!existsSync(seasonDirectory)) {
    consola.fatal(`Season directory '${season}' not found`);
    return 1;
  }

  const urlsFile = path.join(seasonDirectory, URLS_FILE_NAME);
  let urls: string[];
  try {
    urls = await readUrlList(urlsFile);
  } catch (e) {
    consola.fatal(`Could not read ${urlsFile}`);
    consola.log(e);
    return 1;
  }
  consola.info(`Found ${urls.length} URLs to process`);

  const pdfDirectory = path.join(seasonDirectory, PDF_DIRECTORY_NAME);
  try {
    await mkdir(pdfDirectory, { recursive: true });
  } catch (e) {
    consola.fatal(`Could not create ${pdfDirectory}`);
    consola.log(e);
    return 1;
  }

  let font: ResolvedFont;
  try {
    font = resolveChineseFont(
      dependencies.fonts ?? fontCandidates(),
      dependencies.fontCheck ?? loadableFont
    );
  } catch (e) {
    consola.fatal(e instanceof Error ? e.message : e);
    return 1;
  }

  const summary = await runPipeline({
    season: seasonName,
    urls,
    outputDirectory: pdfDirectory,
    source: dependencies.source ?? new EpisodePageFetcher(),
    convert: createScriptConverter(),
    headings: await loadSectionHeadings(),
    renderBatch: (batch, outputPath) => renderEpisodeBatch(batch, outputPath, font),
  });

  if (summary.degradedUrls.length > 0) {
    consola.warn(`${summary.degradedUrls.length} episode(s) could not be fetched`);
  }
  if (summary.failedBatches.length > 0) {
    consola.error(`Batches that failed to render: ${summary.failedBatches.join(", ")}`);
  }
  consola.success(`Wrote ${summary.written.length} PDF(s) to ${pdfDirectory}`);
  return 0;
}
