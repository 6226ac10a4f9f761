import { readFile } from "fs/promises";
import * as path from "path";
import { fileURLToPath } from "url";
import { WIKI_BASE_URL } from "./config.js";

// https://stackoverflow.com/a/50053801/5868796
const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const EPISODE_DATA_ROOT_DIRECTORY = path.resolve(
  path.join(__dirname, "..")
);
export const SECTION_HEADINGS_FILE = path.join(
  EPISODE_DATA_ROOT_DIRECTORY,
  "section_headings.json"
);

/**
 * Reads a newline separated list of URLs. Blank lines are skipped, order is kept.
 */
export async function readUrlList(filePath: string): Promise<string[]> {
  const raw = await readFile(filePath, "utf-8");
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Human readable identifier for a wiki URL, e.g. "宝可梦 第5集" for
 * https://wiki.52poke.com/wiki/%E5%AE%9D%E5%8F%AF%E6%A2%A6_%E7%AC%AC5%E9%9B%86
 */
export function describeSource(sourceUrl: string): string {
  let lastSegment: string | undefined;
  try {
    lastSegment = new URL(sourceUrl).pathname.split("/").filter(Boolean).pop();
  } catch {
    return sourceUrl;
  }
  if (!lastSegment) {
    return sourceUrl;
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(lastSegment);
  } catch {
    decoded = lastSegment;
  }
  return decoded.replace(/_/g, " ").trim();
}

/** Article URLs for episodes 1..count, e.g. "宝可梦_超世代_第1集". */
export function buildEpisodeUrls(
  titlePrefix: string,
  count: number,
  baseUrl: string = WIKI_BASE_URL
): string[] {
  const urls: string[] = [];
  for (let i = 1; i <= count; i++) {
    urls.push(baseUrl + encodeURIComponent(`${titlePrefix}_第${i}集`));
  }
  return urls;
}
