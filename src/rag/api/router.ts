import type { IncomingMessage, ServerResponse } from "node:http";
import { ZodError } from "zod";
import type { RagApp } from "../../app/ragApp.js";
import type { LoadRequest } from "../loaders/contentLoader.js";
import { IngestionError, LoadError, errorMessage } from "../errors.js";
import {
  answerRequestSchema,
  ingestRequestSchema,
  type ErrorResponse,
  type IngestRequest,
  type IngestResponse,
  type SessionResetResponse
} from "./types.js";

/** Bodies above this are rejected before parsing; base64 PDFs dominate. */
export const MAX_BODY_BYTES = 25 * 1024 * 1024;

const SESSION_PATH = /^\/rag\/sessions\/([^/]+)$/;

class BadRequest extends Error {}

export class RagApiRouter {
  constructor(private app: RagApp) {}

  async handle(req: IncomingMessage, res: ServerResponse) {
    const path = new URL(req.url || "/", "http://localhost").pathname;
    try {
      if (req.method === "POST" && path === "/rag/ingest") {
        const body = ingestRequestSchema.parse(await readJson(req));
        const receipt = await this.app.ingest(toLoadRequest(body));
        const resp: IngestResponse = {
          documentId: receipt.documentId,
          title: receipt.title,
          sourceKind: receipt.sourceKind,
          chunkCount: receipt.chunkCount
        };
        return send(res, 200, resp);
      }
      if (req.method === "POST" && path === "/rag/answer") {
        const body = answerRequestSchema.parse(await readJson(req));
        const result = await this.app.ask(body.question, { docIds: body.docIds, sessionId: body.sessionId });
        return send(res, 200, result);
      }
      if (req.method === "GET" && path === "/rag/history") {
        return send(res, 200, await this.app.history.read());
      }
      if (req.method === "DELETE" && path === "/rag/history/uploads") {
        return send(res, 200, await this.app.history.clearUploads());
      }
      if (req.method === "DELETE" && path === "/rag/history/queries") {
        return send(res, 200, await this.app.history.clearQueries());
      }
      const session = SESSION_PATH.exec(path);
      if (req.method === "DELETE" && session) {
        const sessionId = decodeURIComponent(session[1]);
        const resp: SessionResetResponse = { sessionId, cleared: this.app.sessions.reset(sessionId) };
        return send(res, 200, resp);
      }
      if (req.method === "GET" && path === "/health") {
        const report = await this.app.health.checkReadiness();
        return send(res, report.ok ? 200 : 503, report);
      }
      send(res, 404, { error: "not found" });
    } catch (e) {
      this.fail(res, path, e);
    }
  }

  private fail(res: ServerResponse, path: string, e: unknown) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
      return send(res, 400, { error: "invalid request", issues });
    }
    if (e instanceof BadRequest) return send(res, 400, { error: e.message });
    if (e instanceof LoadError) return send(res, 422, { error: e.message });
    this.app.logger.error("api.request.failed", { path, error: e });
    const message = e instanceof IngestionError ? e.message : `internal error: ${errorMessage(e)}`;
    send(res, 500, { error: message });
  }
}

export function toLoadRequest(body: IngestRequest): LoadRequest {
  switch (body.kind) {
    case "text":
      return { kind: "text", text: body.text, title: body.title };
    case "pdf":
      return { kind: "pdf", data: new Uint8Array(Buffer.from(body.dataBase64, "base64")), fileName: body.fileName };
    case "webpage":
    case "youtube":
      return { kind: body.kind, url: body.url };
  }
}

async function readJson(req: IncomingMessage): Promise<unknown> {
  let body = "";
  let size = 0;
  await new Promise<void>((resolve, reject) => {
    req.setEncoding("utf8");
    req.on("data", (c: string) => {
      size += Buffer.byteLength(c);
      if (size <= MAX_BODY_BYTES) body += c;
    });
    req.on("end", resolve);
    req.on("error", reject);
  });
  if (size > MAX_BODY_BYTES) throw new BadRequest(`body exceeds ${MAX_BODY_BYTES} bytes`);
  try {
    return JSON.parse(body || "{}");
  } catch {
    throw new BadRequest("invalid JSON body");
  }
}

function send(res: ServerResponse, status: number, payload: object | ErrorResponse) {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}
