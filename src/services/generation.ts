// src/services/generation.ts
// What: Runs the generative model over an assembled prompt and turns its structured reply into an answer.
// How: The reply must be JSON matching ReplySchema (zod). A reply that does not parse or validate gets one
//      corrective re-prompt (sent after the failed parse, never in parallel); a second bad reply is
//      MalformedModelOutput. Model call failures are ModelUnavailable and are not retried. Citations and images
//      are only accepted when they refer to chunks/images that were actually in the prompt.

import { z } from 'zod';
import { GenerationError, errorMessage } from '../errors.js';
import logger from '../logging.js';
import type { ChatMessage, GenerativeModel } from '../models/types.js';
import type { PromptPayload, SourceChunk } from './context.js';

export const ReplySchema = z.object({
  answer: z.string(),
  citations: z.array(z.string()),
  images: z.array(z.string()),
});

export type ModelReply = z.infer<typeof ReplySchema>;

export interface Citation {
  chunkId: string;
  documentId: string;
  filename: string | null;
  ordinal: number;
  pageStart: number | null;
  pageEnd: number | null;
  score: number;
  rawScore: number;
}

export interface AnswerImage {
  imageId: string;
  documentId: string;
  page: number | null;
  mimeType: string;
  data: string; // base64
}

export interface GeneratedAnswer {
  answer: string;
  citations: Citation[];
  images: AnswerImage[];
}

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Corrective re-prompts allowed after a malformed reply. */
  maxRepairAttempts?: number;
}

type ParseResult = { success: true; data: ModelReply } | { success: false; error: string };

export async function generateAnswer(
  model: GenerativeModel,
  payload: PromptPayload,
  options: GenerateOptions = {},
): Promise<GeneratedAnswer> {
  const { signal } = options;
  const maxRepairs = options.maxRepairAttempts ?? 1;

  let messages = payload.messages;
  let raw = await callModel(model, messages, signal);
  let parsed = parseReply(raw);

  for (let attempt = 0; !parsed.success && attempt < maxRepairs; attempt++) {
    logger.warn({ attempt: attempt + 1, error: parsed.error }, 'Malformed model reply; asking the model to reformat');
    messages = [...messages, { role: 'assistant', content: raw }, { role: 'user', content: repairPrompt(parsed.error) }];
    raw = await callModel(model, messages, signal);
    parsed = parseReply(raw);
  }

  if (!parsed.success) {
    throw new GenerationError('MalformedModelOutput', `Model reply did not match the expected structure: ${parsed.error}`);
  }
  return packageAnswer(parsed.data, payload);
}

export function parseReply(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { success: false, error: `not valid JSON (${errorMessage(err)})` };
  }
  const result = ReplySchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return { success: false, error: issues };
  }
  return { success: true, data: result.data };
}

function repairPrompt(error: string): string {
  return (
    `Your previous reply could not be used (${error}). ` +
    'Reply again with only a JSON object of the form {"answer": string, "citations": string[], "images": string[]} ' +
    'and nothing else.'
  );
}

async function callModel(model: GenerativeModel, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
  signal?.throwIfAborted();
  let raw: string;
  try {
    raw = await model.complete(messages, { signal });
  } catch (err) {
    signal?.throwIfAborted();
    throw new GenerationError('ModelUnavailable', `Generative model call failed: ${errorMessage(err)}`, { cause: err });
  }
  // Cancelled while the call was in flight: the reply is discarded.
  signal?.throwIfAborted();
  return raw;
}

function packageAnswer(reply: ModelReply, payload: PromptPayload): GeneratedAnswer {
  const sources = new Map(payload.sources.map((s) => [s.chunkId, s]));
  const citations: Citation[] = [];
  for (const id of unique(reply.citations.map((c) => stripPrefix(c, 'chunk:')))) {
    const source = sources.get(id);
    if (source) citations.push(toCitation(source));
  }

  const candidates = new Map(payload.candidateImages.map((img) => [img.id, img]));
  const images: AnswerImage[] = [];
  for (const id of unique(reply.images.map((i) => stripPrefix(i, 'image:')))) {
    const img = candidates.get(id);
    if (!img) continue;
    images.push({
      imageId: img.id,
      documentId: img.documentId,
      page: img.page,
      mimeType: img.mimeType,
      data: img.data.toString('base64'),
    });
  }

  const dropped = reply.citations.length + reply.images.length - citations.length - images.length;
  if (dropped > 0) logger.debug({ dropped }, 'Ignored citations/images that were not offered to the model');

  return { answer: reply.answer, citations, images };
}

function toCitation(source: SourceChunk): Citation {
  return {
    chunkId: source.chunkId,
    documentId: source.documentId,
    filename: source.filename,
    ordinal: source.ordinal,
    pageStart: source.pageStart,
    pageEnd: source.pageEnd,
    score: source.score,
    rawScore: source.rawScore,
  };
}

function stripPrefix(value: string, prefix: string): string {
  const v = value.trim();
  return v.startsWith(prefix) ? v.slice(prefix.length) : v;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
