import { consola } from "consola";
import * as path from "path";
import { BATCH_SIZE } from "./config.js";
import { normalizeEpisodeRecord, type ScriptConverter } from "./convertScript.js";
import type { EpisodePageSource } from "./fetchEpisodePage.js";
import { parseEpisode } from "./parseEpisode.js";
import { planBatches } from "./planBatches.js";
import { RenderError } from "./renderEpisodes.js";
import {
  emptyEpisodeRecord,
  type EpisodeBatch,
  type EpisodeRecord,
  type SectionHeadings,
} from "./types.js";

export type BatchRenderer = (batch: EpisodeBatch, outputPath: string) => Promise<void>;

export type PipelineOptions = {
  season: string;
  urls: readonly string[];
  outputDirectory: string;
  source: EpisodePageSource;
  convert: ScriptConverter;
  headings: SectionHeadings;
  renderBatch: BatchRenderer;
  batchSize?: number;
};

export type PipelineSummary = {
  written: string[];
  failedBatches: number[];
  degradedUrls: string[];
};

/**
 * Fetches, parses and converts every URL in order, writing one PDF per batch.
 * A failed fetch or render only costs that episode or batch.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineSummary> {
  const { urls, source, convert, headings } = options;
  const summary: PipelineSummary = { written: [], failedBatches: [], degradedUrls: [] };
  let position = 0;

  for (const batch of planBatches(urls, options.batchSize ?? BATCH_SIZE, options.season)) {
    const records: EpisodeRecord[] = [];

    for (const url of batch.urls) {
      ++position;
      consola.info(`Processing URL ${position}/${urls.length}: ${url}`);

      const result = await source.fetch(url);
      let record: EpisodeRecord;
      if (result.ok) {
        record = parseEpisode(result.page.html, url, headings);
        if (!record.title) {
          consola.warn(`No title found in ${url}`);
        }
      } else {
        consola.warn(result.error.message);
        summary.degradedUrls.push(url);
        record = emptyEpisodeRecord(url);
      }
      records.push(normalizeEpisodeRecord(record, convert));
    }

    const outputPath = path.join(options.outputDirectory, batch.fileName);
    const first = position - records.length + 1;
    consola.log(`Building PDF for episodes ${first}-${position}...`);
    try {
      await options.renderBatch(
        { index: batch.index, fileName: batch.fileName, records },
        outputPath
      );
    } catch (e) {
      if (!(e instanceof RenderError)) {
        throw e;
      }
      consola.error(`Batch ${batch.index} failed: ${e.message}`, e.cause);
      summary.failedBatches.push(batch.index);
      continue;
    }

    summary.written.push(outputPath);
    consola.success(`Completed batch ${batch.index}`);
  }

  return summary;
}
