// src/services/context.ts
// What: Builds the bounded prompt for a question and picks the candidate images.
// How: Instruction + context system messages (chunk blocks in retrieval order, cut at maxContextChars), the most
//      recent historyTurns turns, then the question. Images are candidates when they sit on a page within
//      pageWindow of a chunk that made it into the context; they are collected best chunk first and capped.
//      With no chunks the payload is a plain conversational turn; when documents were searched without a match, the
//      instruction says so instead of inviting an answer from general knowledge.

import type { ChatMessage, ConversationTurn, ImageRecord, RetrievedItem } from '../models/types.js';

export type PromptMode = 'documents' | 'chat';

export interface SourceChunk extends RetrievedItem {
  filename: string | null;
}

export interface PromptPayload {
  mode: PromptMode;
  messages: ChatMessage[];
  /** The chunks whose text is in the prompt, in prompt order. */
  sources: SourceChunk[];
  candidateImages: ImageRecord[];
}

export interface AssembleInput {
  query: string;
  retrieved: readonly RetrievedItem[];
  history: readonly ConversationTurn[];
  images?: readonly ImageRecord[];
  filenames?: ReadonlyMap<string, string>;
  /** True when ready documents were in scope, whether or not anything cleared the relevance floor. */
  searched?: boolean;
}

export interface ContextOptions {
  historyTurns: number;
  maxContextChars: number;
  maxImages: number;
  pageWindow: number;
}

export const DEFAULT_CONTEXT_OPTIONS: ContextOptions = {
  historyTurns: 6,
  maxContextChars: 12_000,
  maxImages: 4,
  pageWindow: 0,
};

const BLOCK_SEPARATOR = '\n\n---\n\n';

export const REPLY_FORMAT =
  'Reply with a JSON object of the form {"answer": string, "citations": string[], "images": string[]}. ' +
  '"citations" lists the ids of the context chunks the answer relies on (the value after "chunk:" in each block ' +
  'header), "images" lists ids of the listed images that illustrate the answer (the value after "image:"). ' +
  'Use empty arrays when nothing applies.';

export const DOCUMENTS_INSTRUCTION =
  "You are a helpful assistant answering questions about the user's documents. " +
  'Use ONLY the provided context to answer. If the answer is not in the context, say you do not know. ' +
  REPLY_FORMAT;

export const CHAT_INSTRUCTION =
  'You are a helpful assistant. No documents are selected for this conversation; answer from general knowledge ' +
  'and the conversation so far. ' +
  REPLY_FORMAT;

export const NO_MATCH_INSTRUCTION =
  "You are a helpful assistant answering questions about the user's documents. " +
  'The selected documents were searched and nothing relevant to this question was found. ' +
  'Say that the documents do not cover it; do not answer from general knowledge. ' +
  REPLY_FORMAT;

export function assembleContext(input: AssembleInput, options: Partial<ContextOptions> = {}): PromptPayload {
  const opts = { ...DEFAULT_CONTEXT_OPTIONS, ...options };
  const { blocks, sources } = packContext(input.retrieved, input.filenames, opts.maxContextChars);
  const history = opts.historyTurns > 0 ? input.history.slice(-opts.historyTurns) : [];
  const turns: ChatMessage[] = history.map((t) => ({ role: t.role, content: t.content }));
  const question: ChatMessage = { role: 'user', content: input.query };

  if (sources.length === 0) {
    return {
      mode: 'chat',
      messages: [
        { role: 'system', content: input.searched ? NO_MATCH_INSTRUCTION : CHAT_INSTRUCTION },
        ...turns,
        question,
      ],
      sources: [],
      candidateImages: [],
    };
  }

  const candidateImages = resolveImages(sources, input.images ?? [], opts);
  let contextText = `Context:\n${blocks.join(BLOCK_SEPARATOR)}`;
  if (candidateImages.length > 0) {
    const lines = candidateImages.map((img) => {
      const name = input.filenames?.get(img.documentId) ?? img.documentId;
      return `[image:${img.id}] ${name}${img.page === null ? '' : ` p.${img.page}`}`;
    });
    contextText += `\n\nImages:\n${lines.join('\n')}`;
  }

  return {
    mode: 'documents',
    messages: [
      { role: 'system', content: DOCUMENTS_INSTRUCTION },
      { role: 'system', content: contextText },
      ...turns,
      question,
    ],
    sources,
    candidateImages,
  };
}

function packContext(
  retrieved: readonly RetrievedItem[],
  filenames: ReadonlyMap<string, string> | undefined,
  budget: number,
): { blocks: string[]; sources: SourceChunk[] } {
  const blocks: string[] = [];
  const sources: SourceChunk[] = [];
  let used = 0;
  for (const item of retrieved) {
    const filename = filenames?.get(item.documentId) ?? null;
    let block = `${blockHeader(item, filename)}\n${item.text}`;
    const cost = block.length + (blocks.length > 0 ? BLOCK_SEPARATOR.length : 0);
    if (used + cost > budget) {
      if (blocks.length > 0) break;
      // The best chunk always goes in, cut down to the budget.
      block = block.slice(0, budget);
    }
    blocks.push(block);
    sources.push({ ...item, filename });
    used += cost;
  }
  return { blocks, sources };
}

function blockHeader(item: RetrievedItem, filename: string | null): string {
  const pages = pageLabel(item.pageStart, item.pageEnd);
  return `[chunk:${item.chunkId}] ${filename ?? item.documentId}${pages ? ` p.${pages}` : ''}`;
}

function pageLabel(start: number | null, end: number | null): string {
  if (start === null) return '';
  if (end === null || end === start) return String(start);
  return `${start}-${end}`;
}

/**
 * Images near each source chunk, best chunk first, without repeats, capped at maxImages.
 * "Near" means same document and a page in [pageStart - pageWindow, pageEnd + pageWindow].
 */
export function resolveImages(
  sources: readonly RetrievedItem[],
  images: readonly ImageRecord[],
  options: Pick<ContextOptions, 'maxImages' | 'pageWindow'>,
): ImageRecord[] {
  const picked: ImageRecord[] = [];
  const seen = new Set<string>();
  for (const chunk of sources) {
    if (picked.length >= options.maxImages) break;
    if (chunk.pageStart === null) continue;
    const from = chunk.pageStart - options.pageWindow;
    const to = (chunk.pageEnd ?? chunk.pageStart) + options.pageWindow;
    const near = images
      .filter((img) => img.documentId === chunk.documentId && img.page !== null && img.page >= from && img.page <= to)
      .sort((a, b) => (a.page ?? 0) - (b.page ?? 0) || a.ordinal - b.ordinal);
    for (const img of near) {
      if (picked.length >= options.maxImages) break;
      if (seen.has(img.id)) continue;
      seen.add(img.id);
      picked.push(img);
    }
  }
  return picked;
}
