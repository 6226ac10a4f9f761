import { readFile } from "fs/promises";
import { JSDOM } from "jsdom";
import {
  emptyEpisodeRecord,
  type EpisodeRecord,
  type SectionHeadings,
} from "./types.js";
import { describeSource, SECTION_HEADINGS_FILE } from "./utils.js";

const HEADING_SELECTOR = "h1, h2, h3, h4, h5, h6";
const NOISE_SELECTOR = "sup.reference, .mw-editsection, style, script";

/**
 * Builds an episode record out of a 52poke article. Sections are looked up by
 * heading text, so any of them may be missing or out of order; a missing one
 * leaves its field empty.
 */
export function parseEpisode(
  rawHtml: string,
  sourceUrl: string,
  headings: SectionHeadings
): EpisodeRecord {
  let document: Document;
  try {
    document = new JSDOM(rawHtml).window.document;
  } catch {
    return emptyEpisodeRecord(sourceUrl);
  }

  const contentWrapper =
    document.querySelector(".mw-parser-output") ?? document.body;
  if (!contentWrapper) {
    return emptyEpisodeRecord(sourceUrl);
  }

  return {
    sourceUrl,
    sourceLabel: describeSource(sourceUrl),
    title: parseTitle(document),
    introduction: parseIntroduction(contentWrapper, headings.introduction),
    summary: parseSummary(contentWrapper, headings.summary),
    mainEvents: parseMainEvents(contentWrapper, headings.mainEvents),
  };
}

function parseTitle(document: Document): string {
  const heading =
    document.querySelector("#firstHeading") ?? document.querySelector("h1");
  return heading ? flattenText(heading) : "";
}

function parseIntroduction(contentWrapper: Element, synonyms: string[]): string {
  const section = findSection(contentWrapper, synonyms);
  if (section) {
    return paragraphsOf(section).join("\n");
  }

  // No dedicated heading: use the lead paragraph
  for (const child of Array.from(contentWrapper.children)) {
    if (isHeadingBlock(child)) {
      break;
    }
    if (child.tagName === "P") {
      const text = flattenText(child);
      if (text) {
        return text;
      }
    }
  }
  return "";
}

function parseSummary(contentWrapper: Element, synonyms: string[]): string {
  const section = findSection(contentWrapper, synonyms);
  return section ? paragraphsOf(section).join("\n") : "";
}

function parseMainEvents(contentWrapper: Element, synonyms: string[]): string[] {
  const section = findSection(contentWrapper, synonyms);
  const list = section?.find(
    (element) => element.tagName === "UL" || element.tagName === "OL"
  );
  if (!list) {
    return [];
  }

  return Array.from(list.children)
    .filter((item) => item.tagName === "LI")
    .map((item) => flattenText(item))
    .filter((text) => text.length > 0);
}

function paragraphsOf(section: Element[]): string[] {
  return section
    .filter((element) => element.tagName === "P")
    .map((paragraph) => flattenText(paragraph))
    .filter((text) => text.length > 0);
}

/**
 * Elements belonging to the first heading whose text (or anchor id) matches one
 * of the synonyms, up to the next heading of the same or a higher level.
 */
function findSection(
  contentWrapper: Element,
  synonyms: string[]
): Element[] | undefined {
  const wanted = new Set(synonyms.map(normalizeHeadingText));

  for (const heading of Array.from(contentWrapper.querySelectorAll(HEADING_SELECTOR))) {
    if (!headingKeys(heading).some((key) => wanted.has(key))) {
      continue;
    }

    const level = headingLevel(heading);
    // Newer MediaWiki wraps headings in <div class="mw-heading">
    const parent = heading.parentElement;
    const anchor =
      parent && parent.classList.contains("mw-heading") ? parent : heading;

    const elements: Element[] = [];
    let sibling = anchor.nextElementSibling;
    while (sibling && !(isHeadingBlock(sibling) && blockLevel(sibling) <= level)) {
      elements.push(sibling);
      sibling = sibling.nextElementSibling;
    }
    return elements;
  }
  return undefined;
}

function headingKeys(heading: Element): string[] {
  const headline = heading.querySelector(".mw-headline");
  const keys = [normalizeHeadingText(flattenText(headline ?? heading))];
  for (const id of [heading.id, headline?.id]) {
    if (id) {
      keys.push(normalizeHeadingText(decodeAnchorId(id)));
    }
  }
  return keys;
}

export function normalizeHeadingText(text: string): string {
  return text
    .replace(/[[［【][^\]］】]*[\]］】]/g, "")
    .replace(/[:：]\s*$/, "")
    .replace(/\s+/g, "")
    .trim();
}

/**
 * Legacy MediaWiki anchors encode UTF-8 bytes as ".XX" (e.g. ".E6.91.98.E8.A6.81"
 * for 摘要); newer ones keep the text or percent-encode it.
 */
export function decodeAnchorId(id: string): string {
  const percentEncoded = /^(\.[0-9A-F]{2})+$/i.test(id)
    ? id.replace(/\./g, "%")
    : id.replace(/_/g, " ");
  try {
    return decodeURIComponent(percentEncoded);
  } catch {
    return id;
  }
}

function isHeadingBlock(element: Element): boolean {
  return (
    /^H[1-6]$/.test(element.tagName) || element.classList.contains("mw-heading")
  );
}

function headingLevel(heading: Element): number {
  return Number(heading.tagName.slice(1));
}

function blockLevel(element: Element): number {
  if (/^H[1-6]$/.test(element.tagName)) {
    return headingLevel(element);
  }
  const inner = element.querySelector(HEADING_SELECTOR);
  return inner ? headingLevel(inner) : 6;
}

/** Plain text of an element: links and inline markup flattened, footnotes dropped. */
export function flattenText(element: Element): string {
  return collectText(element).replace(/\s+/g, " ").trim();
}

function collectText(node: Node): string {
  if (node.nodeType === node.TEXT_NODE) {
    return node.textContent ?? "";
  }
  if (isElement(node)) {
    if (node.matches(NOISE_SELECTOR)) {
      return "";
    }
    if (node.tagName === "BR") {
      return " ";
    }
  }
  return Array.from(node.childNodes).map(collectText).join("");
}

function isElement(node: Node): node is Element {
  return node.nodeType === node.ELEMENT_NODE;
}

export async function loadSectionHeadings(
  filePath: string = SECTION_HEADINGS_FILE
): Promise<SectionHeadings> {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`Section headings in ${filePath} must be a JSON object`);
  }

  const field = (name: keyof SectionHeadings): string[] => {
    const value: unknown = Reflect.get(parsed, name);
    if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
      throw new Error(`"${name}" in ${filePath} must be a list of strings`);
    }
    return value;
  };

  return {
    introduction: field("introduction"),
    summary: field("summary"),
    mainEvents: field("mainEvents"),
  };
}
