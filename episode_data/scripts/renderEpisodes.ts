import { consola } from "consola";
import { createWriteStream, existsSync } from "fs";
import PDFDocument from "pdfkit";
import type { FontCandidate } from "./config.js";
import type { EpisodeBatch, EpisodeRecord } from "./types.js";

export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

const PAGE_MARGIN = 48;
const EPISODE_SPACING = 30;
const BULLET_INDENT = 16;
const FONT_NAME = "EpisodeFont";

export const UNTITLED_EPISODE = "未命名集數";
export const SUMMARY_LABEL = "摘要";
export const MAIN_EVENTS_LABEL = "主要事件：";

export type LayoutItemKind = "title" | "paragraph" | "label" | "bullet";

export type LayoutItem = {
  kind: LayoutItemKind;
  text: string;
};

type ItemStyle = {
  fontSize: number;
  lineGap: number;
  spaceBefore: number;
  spaceAfter: number;
  indent: number;
  align: "left" | "center";
};

const STYLES: Record<LayoutItemKind, ItemStyle> = {
  title: { fontSize: 12, lineGap: 4, spaceBefore: 0, spaceAfter: 12, indent: 0, align: "center" },
  paragraph: { fontSize: 10, lineGap: 4, spaceBefore: 6, spaceAfter: 6, indent: 0, align: "left" },
  label: { fontSize: 10, lineGap: 4, spaceBefore: 12, spaceAfter: 6, indent: 0, align: "left" },
  bullet: { fontSize: 10, lineGap: 4, spaceBefore: 3, spaceAfter: 3, indent: BULLET_INDENT, align: "left" },
};

/**
 * Splits an episode into blocks that are kept on one page when they fit:
 * title with introduction, summary, main events. Empty sections produce no block.
 */
export function buildEpisodeBlocks(record: EpisodeRecord): LayoutItem[][] {
  const heading: LayoutItem[] = [];
  if (record.title) {
    heading.push({ kind: "title", text: record.title });
  } else {
    heading.push({ kind: "title", text: UNTITLED_EPISODE });
    heading.push({ kind: "paragraph", text: record.sourceLabel });
  }
  if (record.introduction) {
    heading.push({ kind: "paragraph", text: record.introduction });
  }

  const blocks = [heading];

  const summaryParagraphs = record.summary
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (summaryParagraphs.length > 0) {
    blocks.push([
      { kind: "label", text: SUMMARY_LABEL },
      ...summaryParagraphs.map((text): LayoutItem => ({ kind: "paragraph", text })),
    ]);
  }

  if (record.mainEvents.length > 0) {
    blocks.push([
      { kind: "label", text: MAIN_EVENTS_LABEL },
      ...record.mainEvents.map((text): LayoutItem => ({ kind: "bullet", text: `• ${text}` })),
    ]);
  }

  return blocks;
}

/**
 * A block that does not fit below the cursor moves to the next page, unless the
 * cursor is already at the top (the block is then taller than a page).
 */
export function shouldBreakBefore(
  cursorY: number,
  blockHeight: number,
  pageTop: number,
  pageBottom: number
): boolean {
  return cursorY > pageTop && cursorY + blockHeight > pageBottom;
}

export type ResolvedFont = FontCandidate;

export type FontCheck = (candidate: FontCandidate) => boolean;

export const loadableFont: FontCheck = (candidate) => {
  if (!existsSync(candidate.src)) {
    return false;
  }
  const testDoc = new PDFDocument({ autoFirstPage: false });
  try {
    testDoc.font(candidate.src, candidate.family);
    return true;
  } catch (e) {
    consola.warn(`Failed to load font ${candidate.src}`, e);
    return false;
  } finally {
    testDoc.end();
  }
};

/**
 * Picks the first candidate the check accepts. Without a CJK capable font the
 * PDFs would come out unreadable, so running out of candidates is an error.
 */
export function resolveChineseFont(
  candidates: readonly FontCandidate[],
  isLoadable: FontCheck = loadableFont
): ResolvedFont {
  for (const candidate of candidates) {
    if (isLoadable(candidate)) {
      consola.success(`Loaded Chinese font: ${candidate.src}`);
      return candidate;
    }
  }
  throw new RenderError(
    `No Chinese font found, tried: ${candidates.map((c) => c.src).join(", ")}`
  );
}

/** Writes one batch to `outputPath`, replacing any existing file. */
export function renderEpisodeBatch(
  batch: EpisodeBatch,
  outputPath: string,
  font: ResolvedFont
): Promise<void> {
  return new Promise((resolve, reject) => {
    const stream = createWriteStream(outputPath);
    stream.on("finish", () => resolve());
    stream.on("error", (e) =>
      reject(new RenderError(`Could not write ${outputPath}`, { cause: e }))
    );

    const doc = new PDFDocument({
      size: "A4",
      margins: {
        top: PAGE_MARGIN,
        bottom: PAGE_MARGIN,
        left: PAGE_MARGIN,
        right: PAGE_MARGIN,
      },
      info: { Title: batch.fileName.replace(/\.pdf$/, "") },
    });
    doc.pipe(stream);

    try {
      doc.registerFont(FONT_NAME, font.src, font.family);
      for (const record of batch.records) {
        drawEpisode(doc, record);
      }
    } catch (e) {
      stream.destroy();
      reject(new RenderError(`Could not lay out ${batch.fileName}`, { cause: e }));
      return;
    }

    doc.end();
  });
}

function drawEpisode(doc: PDFKit.PDFDocument, record: EpisodeRecord): void {
  const pageTop = PAGE_MARGIN;
  const pageBottom = doc.page.height - PAGE_MARGIN;

  for (const block of buildEpisodeBlocks(record)) {
    const height = block.reduce((total, item) => total + measureItem(doc, item), 0);
    if (shouldBreakBefore(doc.y, height, pageTop, pageBottom)) {
      doc.addPage();
    }
    for (const item of block) {
      drawItem(doc, item);
    }
  }

  doc.y += EPISODE_SPACING;
}

function textWidth(doc: PDFKit.PDFDocument, style: ItemStyle): number {
  return doc.page.width - PAGE_MARGIN * 2 - style.indent;
}

function measureItem(doc: PDFKit.PDFDocument, item: LayoutItem): number {
  const style = STYLES[item.kind];
  doc.font(FONT_NAME).fontSize(style.fontSize);
  const textHeight = doc.heightOfString(item.text, {
    width: textWidth(doc, style),
    lineGap: style.lineGap,
  });
  return style.spaceBefore + textHeight + style.spaceAfter;
}

function drawItem(doc: PDFKit.PDFDocument, item: LayoutItem): void {
  const style = STYLES[item.kind];
  doc.y += style.spaceBefore;
  doc
    .font(FONT_NAME)
    .fontSize(style.fontSize)
    .text(item.text, PAGE_MARGIN + style.indent, doc.y, {
      width: textWidth(doc, style),
      lineGap: style.lineGap,
      align: style.align,
    });
  doc.y += style.spaceAfter;
}
