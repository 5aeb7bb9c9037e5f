export type TranscriptSegment = { text: string };

export interface TranscriptSource {
  fetchTranscript(videoId: string): Promise<TranscriptSegment[]>;
}

/** Transcripts through the `youtube-transcript` package, loaded on first use. */
export class YoutubeTranscriptSource implements TranscriptSource {
  async fetchTranscript(videoId: string): Promise<TranscriptSegment[]> {
    const { YoutubeTranscript } = await import("youtube-transcript");
    return YoutubeTranscript.fetchTranscript(videoId);
  }
}

const VIDEO_ID = /(?:[?&]v=|youtu\.be\/|\/embed\/|\/shorts\/)([0-9A-Za-z_-]{11})/;

export function extractVideoId(url: string): string | undefined {
  return VIDEO_ID.exec(url)?.[1];
}

export function joinTranscript(segments: readonly TranscriptSegment[]): string {
  return segments
    .map((s) => s.text.trim())
    .filter((t) => t.length > 0)
    .join(" ");
}
