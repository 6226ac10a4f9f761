import { consola } from "consola";
import { beforeAll, describe, it, expect } from "vitest";
import { createScriptConverter } from "./convertScript.js";
import { FetchError, type EpisodePageSource, type FetchResult } from "./fetchEpisodePage.js";
import { RenderError } from "./renderEpisodes.js";
import { runPipeline, type BatchRenderer, type PipelineOptions } from "./runPipeline.js";
import type { EpisodeBatch, SectionHeadings } from "./types.js";

const headings: SectionHeadings = {
  introduction: ["简介"],
  summary: ["摘要"],
  mainEvents: ["主要事件"],
};

const urlList = (count: number) =>
  Array.from({ length: count }, (_, i) => `https://example.com/wiki/ep${i + 1}`);

function episodePage(url: string): string {
  const n = url.split("ep").pop();
  return `<h1>宝可梦 第${n}集</h1><div class="mw-parser-output">
<p>导语${n}</p>
<h2>摘要</h2><p>摘要${n}</p>
<h2>主要事件</h2><ul><li>事件${n}</li></ul>
</div>`;
}

function fakeSource(failing: Record<string, FetchError> = {}): EpisodePageSource & { requested: string[] } {
  const requested: string[] = [];
  return {
    requested,
    fetch: async (url): Promise<FetchResult> => {
      requested.push(url);
      const error = failing[url];
      if (error) {
        return { ok: false, error };
      }
      return { ok: true, page: { url, status: 200, html: episodePage(url) } };
    },
  };
}

function capturingRenderer() {
  const rendered: { outputPath: string; batch: EpisodeBatch }[] = [];
  const renderBatch: BatchRenderer = async (batch, outputPath) => {
    rendered.push({ outputPath, batch });
  };
  return { rendered, renderBatch };
}

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    season: "1997",
    urls: urlList(25),
    outputDirectory: "/out/pdf",
    source: fakeSource(),
    convert: (text) => text,
    headings,
    renderBatch: capturingRenderer().renderBatch,
    ...overrides,
  };
}

beforeAll(() => {
  consola.level = -999;
});

describe("runPipeline", () => {
  it("should write 25 episodes as part1 with 1-20 and part2 with 21-25", async () => {
    const { rendered, renderBatch } = capturingRenderer();
    const source = fakeSource();

    const summary = await runPipeline(options({ source, renderBatch }));

    expect(summary.written).toEqual([
      "/out/pdf/1997_episodes_part1.pdf",
      "/out/pdf/1997_episodes_part2.pdf",
    ]);
    expect(rendered.map((r) => r.outputPath)).toEqual(summary.written);
    expect(rendered[0].batch.records.map((r) => r.sourceUrl)).toEqual(urlList(20));
    expect(rendered[1].batch.records.map((r) => r.sourceUrl)).toEqual(urlList(25).slice(20));
    expect(source.requested).toEqual(urlList(25));
  });

  it("should parse and convert each episode before rendering", async () => {
    const { rendered, renderBatch } = capturingRenderer();

    await runPipeline(
      options({ urls: urlList(1), renderBatch, convert: createScriptConverter() })
    );

    expect(rendered[0].batch.records[0]).toEqual({
      sourceUrl: "https://example.com/wiki/ep1",
      sourceLabel: "ep1",
      title: "寶可夢 第1集",
      introduction: "導語1",
      summary: "摘要1",
      mainEvents: ["事件1"],
    });
  });

  it("should keep going with an empty record when a fetch times out", async () => {
    const { rendered, renderBatch } = capturingRenderer();
    const slowUrl = "https://example.com/wiki/ep2";
    const source = fakeSource({
      [slowUrl]: new FetchError("timeout", slowUrl, `Timed out fetching ${slowUrl}`),
    });

    const summary = await runPipeline(options({ urls: urlList(3), source, renderBatch }));

    expect(summary.degradedUrls).toEqual([slowUrl]);
    expect(source.requested).toEqual(urlList(3));
    const records = rendered[0].batch.records;
    expect(records).toHaveLength(3);
    expect(records[1]).toEqual({
      sourceUrl: slowUrl,
      sourceLabel: "ep2",
      title: "",
      introduction: "",
      summary: "",
      mainEvents: [],
    });
    expect(records[2].title).toBe("宝可梦 第3集");
  });

  it("should carry on with later batches when one fails to render", async () => {
    const written: string[] = [];
    const renderBatch: BatchRenderer = async (batch, outputPath) => {
      if (batch.index === 1) {
        throw new RenderError("disk full");
      }
      written.push(outputPath);
    };

    const summary = await runPipeline(options({ renderBatch }));

    expect(summary.failedBatches).toEqual([1]);
    expect(summary.written).toEqual(["/out/pdf/1997_episodes_part2.pdf"]);
    expect(written).toEqual(["/out/pdf/1997_episodes_part2.pdf"]);
  });

  it("should propagate errors that are not render errors", async () => {
    const renderBatch: BatchRenderer = async () => {
      throw new TypeError("unexpected");
    };

    await expect(runPipeline(options({ renderBatch }))).rejects.toThrow(TypeError);
  });

  it("should assign episodes to the same files on every run", async () => {
    const first = capturingRenderer();
    const second = capturingRenderer();

    await runPipeline(options({ urls: urlList(45), renderBatch: first.renderBatch }));
    await runPipeline(options({ urls: urlList(45), renderBatch: second.renderBatch }));

    const assignment = (rendered: typeof first.rendered) =>
      rendered.map((r) => [r.outputPath, r.batch.records.map((record) => record.sourceUrl)]);
    expect(assignment(second.rendered)).toEqual(assignment(first.rendered));
    expect(first.rendered.map((r) => r.batch.fileName)).toEqual([
      "1997_episodes_part1.pdf",
      "1997_episodes_part2.pdf",
      "1997_episodes_part3.pdf",
    ]);
  });
});
