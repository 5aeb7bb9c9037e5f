import { z } from "zod";
import type { SourceKind } from "../types.js";

export const ingestRequestSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), text: z.string().min(1), title: z.string().optional() }),
  z.object({ kind: z.literal("pdf"), dataBase64: z.string().min(1), fileName: z.string().min(1) }),
  z.object({ kind: z.literal("webpage"), url: z.string().url() }),
  z.object({ kind: z.literal("youtube"), url: z.string().url() })
]);

export const answerRequestSchema = z.object({
  question: z.string().trim().min(1),
  docIds: z.array(z.string().min(1)).optional(),
  sessionId: z.string().min(1).optional()
});

export type IngestRequest = z.infer<typeof ingestRequestSchema>;

export type IngestResponse = {
  documentId: string;
  title: string;
  sourceKind: SourceKind;
  chunkCount: number;
};

/** `cleared` is false for a session the server did not know. */
export type SessionResetResponse = { sessionId: string; cleared: boolean };

export type ErrorResponse = { error: string; issues?: string[] };
