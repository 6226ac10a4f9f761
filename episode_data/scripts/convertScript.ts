import * as OpenCC from "opencc-js";
import type { EpisodeRecord } from "./types.js";

export type ScriptConverter = (text: string) => string;

// A few characters only settle after a second pass (苎 -> 苧 -> 薴)
const MAX_CONVERSION_PASSES = 5;

// OpenCC "s2t": Simplified Chinese to standard Traditional characters
export function createScriptConverter(
  from: OpenCC.Locale = "cn",
  to: OpenCC.Locale = "t"
): ScriptConverter {
  const convert = OpenCC.Converter({ from, to });
  return (text) => {
    let current = text;
    for (let pass = 0; current && pass < MAX_CONVERSION_PASSES; pass++) {
      const next = convert(current);
      if (next === current) {
        break;
      }
      current = next;
    }
    return current;
  };
}

/**
 * Returns a new, frozen record with every text field converted. The input
 * record is left as it was.
 */
export function normalizeEpisodeRecord(
  record: EpisodeRecord,
  convert: ScriptConverter
): EpisodeRecord {
  return Object.freeze({
    sourceUrl: record.sourceUrl,
    sourceLabel: convert(record.sourceLabel),
    title: convert(record.title),
    introduction: convert(record.introduction),
    summary: convert(record.summary),
    mainEvents: Object.freeze(record.mainEvents.map((event) => convert(event))),
  });
}
