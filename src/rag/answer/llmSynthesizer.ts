import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type LanguageModel } from "ai";
import type { AnswerSynthesizer, SynthesisRequest } from "../types.js";

export const SYSTEM_PROMPT =
  "You answer questions using only the provided context. " +
  "Answer concisely. If the context does not contain the answer, say that you don't know.";

export function buildPrompt(request: SynthesisRequest): string {
  const context = request.chunks.map((c) => c.text).join("\n\n");
  const parts = [`Context:\n${context}`];
  if (request.history?.length) {
    const turns = request.history.map((t) => `Q: ${t.question}\nA: ${t.answer}`).join("\n");
    parts.push(`Earlier in this conversation:\n${turns}`);
  }
  parts.push(`Question: ${request.question}`);
  return parts.join("\n\n");
}

export type AiSdkSynthesizerOptions = {
  model: LanguageModel;
  modelId: string;
  timeoutMs: number;
  maxRetries?: number;
};

export class AiSdkSynthesizer implements AnswerSynthesizer {
  readonly model: string;

  constructor(private opts: AiSdkSynthesizerOptions) {
    this.model = opts.modelId;
  }

  async synthesize(request: SynthesisRequest): Promise<string> {
    const { text } = await generateText({
      model: this.opts.model,
      system: SYSTEM_PROMPT,
      prompt: buildPrompt(request),
      temperature: 0,
      maxRetries: this.opts.maxRetries ?? 1,
      abortSignal: AbortSignal.timeout(this.opts.timeoutMs)
    });
    return text;
  }
}

export function createOpenAiSynthesizer(settings: {
  apiKey: string;
  llmModel: string;
  requestTimeoutMs: number;
}): AiSdkSynthesizer {
  const provider = createOpenAI({ apiKey: settings.apiKey });
  return new AiSdkSynthesizer({
    model: provider.chat(settings.llmModel),
    modelId: settings.llmModel,
    timeoutMs: settings.requestTimeoutMs
  });
}
