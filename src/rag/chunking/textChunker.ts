import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { ConfigurationError } from "../errors.js";

export const CHUNK_SEPARATORS = ["\n\n", "\n", " "];

export type ChunkerOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

export interface Chunker {
  split(text: string): Promise<string[]>;
}

/**
 * Paragraph, then line, then word splitting. Pieces are merged up to
 * `chunkSize` characters and consecutive chunks share up to `chunkOverlap`
 * characters. A single word longer than `chunkSize` is kept whole.
 */
export class TextChunker implements Chunker {
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(readonly options: ChunkerOptions) {
    const { chunkSize, chunkOverlap } = options;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigurationError(`chunkOverlap must be in [0, ${chunkSize}), got ${chunkOverlap}`);
    }
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize,
      chunkOverlap,
      separators: CHUNK_SEPARATORS
    });
  }

  async split(text: string): Promise<string[]> {
    const normalized = normalizeLineEndings(text);
    if (normalized.trim().length === 0) return [];
    const chunks = await this.splitter.splitText(normalized);
    return chunks.filter((c) => c.trim().length > 0);
  }
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}
