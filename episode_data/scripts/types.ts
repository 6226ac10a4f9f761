import { describeSource } from "./utils.js";

/**
 * Content extracted from one episode article.
 *
 * Missing sections are empty strings / an empty list, never undefined, so a
 * record can always be built and rendered.
 */
export type EpisodeRecord = Readonly<{
  sourceUrl: string;
  // Article name taken from the URL, shown when the page gave no title
  sourceLabel: string;
  title: string;
  introduction: string;
  summary: string;
  mainEvents: readonly string[];
}>;

/** Contiguous run of URLs that ends up in one PDF file. */
export type UrlBatch = {
  index: number;
  fileName: string;
  urls: readonly string[];
};

export type EpisodeBatch = {
  index: number;
  fileName: string;
  records: readonly EpisodeRecord[];
};

export type SectionHeadings = {
  introduction: string[];
  summary: string[];
  mainEvents: string[];
};

export function emptyEpisodeRecord(sourceUrl: string): EpisodeRecord {
  return Object.freeze({
    sourceUrl,
    sourceLabel: describeSource(sourceUrl),
    title: "",
    introduction: "",
    summary: "",
    mainEvents: Object.freeze([]),
  });
}
