import type { SourceKind } from "../types.js";
import { LoadError } from "../errors.js";
import { silentLogger, type Logger } from "../../logging/logger.js";
import { withTimeout } from "../../util/time.js";
import { fetchPage, type FetchLike } from "./webLoader.js";
import { PdfjsTextExtractor, type PdfTextExtractor } from "./pdfLoader.js";
import { extractVideoId, joinTranscript, YoutubeTranscriptSource, type TranscriptSource } from "./youtubeLoader.js";

export type LoadRequest =
  | { kind: "text"; text: string; title?: string }
  | { kind: "pdf"; data: Uint8Array; fileName: string }
  | { kind: "webpage"; url: string }
  | { kind: "youtube"; url: string };

export type LoadedContent = {
  text: string;
  title: string;
  sourceKind: SourceKind;
  /** File name or URL; feeds the document id. */
  locator?: string;
};

export type ContentLoaderOptions = {
  timeoutMs: number;
  fetch?: FetchLike;
  pdf?: PdfTextExtractor;
  transcripts?: TranscriptSource;
  logger?: Logger;
};

/**
 * Turns an upload, URL or pasted text into raw text plus a source label.
 * Every failure surfaces as a `LoadError` naming the locator.
 */
export class ContentLoader {
  private readonly fetchImpl: FetchLike;
  private readonly pdf: PdfTextExtractor;
  private readonly transcripts: TranscriptSource;
  private readonly logger: Logger;

  constructor(private readonly opts: ContentLoaderOptions) {
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.pdf = opts.pdf ?? new PdfjsTextExtractor();
    this.transcripts = opts.transcripts ?? new YoutubeTranscriptSource();
    this.logger = (opts.logger ?? silentLogger()).child({ component: "loader" });
  }

  async load(request: LoadRequest): Promise<LoadedContent> {
    const locator = describe(request);
    try {
      const loaded = await this.loadUnchecked(request);
      this.logger.info("load.done", { kind: request.kind, locator, chars: loaded.text.length });
      return loaded;
    } catch (e) {
      this.logger.warn("load.failed", { kind: request.kind, locator, error: e });
      throw e instanceof LoadError ? e : new LoadError(request.kind, locator, e);
    }
  }

  private async loadUnchecked(request: LoadRequest): Promise<LoadedContent> {
    switch (request.kind) {
      case "text":
        return { text: request.text, title: request.title?.trim() || "pasted text", sourceKind: "text" };
      case "pdf": {
        const text = await this.pdf.extract(request.data);
        return { text, title: request.fileName, sourceKind: "pdf", locator: request.fileName };
      }
      case "webpage": {
        const page = await fetchPage(request.url, this.fetchImpl, this.opts.timeoutMs);
        return { text: page.text, title: page.title, sourceKind: "webpage", locator: request.url };
      }
      case "youtube": {
        const videoId = extractVideoId(request.url);
        if (!videoId) throw new Error("Invalid YouTube URL");
        const segments = await withTimeout(
          this.transcripts.fetchTranscript(videoId),
          this.opts.timeoutMs,
          "transcript fetch"
        );
        return { text: joinTranscript(segments), title: "YouTube", sourceKind: "youtube", locator: request.url };
      }
    }
  }
}

function describe(request: LoadRequest): string {
  switch (request.kind) {
    case "text":
      return request.title ?? "pasted text";
    case "pdf":
      return request.fileName;
    case "webpage":
    case "youtube":
      return request.url;
  }
}
