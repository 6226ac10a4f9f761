export const BATCH_SIZE = 20;

// Measured between the starts of two consecutive requests
export const MIN_REQUEST_INTERVAL_MS = 1000;
export const REQUEST_TIMEOUT_MS = 30_000;
export const USER_AGENT =
  "Mozilla/5.0 (compatible; pokemon-episode-pdfs/1.0; personal reference use)";

export const WIKI_BASE_URL = "https://wiki.52poke.com/wiki/";
export const URLS_FILE_NAME = "urls.txt";
export const PDF_DIRECTORY_NAME = "pdf";

export type FontCandidate = {
  // File path, or the name of a font built into PDF readers
  src: string;
  // Font to pick out of a .ttc collection
  family?: string;
};

// First candidate that loads wins
export const CHINESE_FONT_CANDIDATES: FontCandidate[] = [
  { src: "/System/Library/Fonts/PingFang.ttc", family: "PingFangTC-Regular" },
  { src: "/System/Library/Fonts/STHeiti Light.ttc", family: "STHeitiTC-Light" },
  { src: "/System/Library/Fonts/STHeiti Medium.ttc", family: "STHeitiTC-Medium" },
  { src: "/Library/Fonts/Arial Unicode.ttf" },
  {
    src: "/usr/share/fonts/opentype/noto/NotoSansCJK-Regular.ttc",
    family: "NotoSansCJKtc-Regular",
  },
  {
    src: "/usr/share/fonts/noto-cjk/NotoSansCJK-Regular.ttc",
    family: "NotoSansCJKtc-Regular",
  },
  { src: "C:\\Windows\\Fonts\\msjh.ttc", family: "MicrosoftJhengHeiRegular" },
];

/**
 * Candidates for this run: EPISODE_PDF_FONT ("<path>" or "<path>#<family>")
 * goes first when set.
 */
export function fontCandidates(
  env: NodeJS.ProcessEnv = process.env
): FontCandidate[] {
  const override = env.EPISODE_PDF_FONT?.trim();
  if (!override) {
    return CHINESE_FONT_CANDIDATES;
  }

  // Paths may contain "#" themselves, so the family follows the last one
  const separator = override.lastIndexOf("#");
  const candidate: FontCandidate =
    separator > 0 && separator < override.length - 1
      ? { src: override.slice(0, separator), family: override.slice(separator + 1) }
      : { src: override };
  return [candidate, ...CHINESE_FONT_CANDIDATES];
}

export type SeasonUrlPattern = {
  titlePrefix: string;
  episodeCount: number;
};

export const KNOWN_SEASONS: Record<string, SeasonUrlPattern> = {
  advanced_generation: { titlePrefix: "宝可梦_超世代", episodeCount: 191 },
};
