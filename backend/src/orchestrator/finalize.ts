import { z } from 'zod';
import type { Citation, ConversationMessage } from '../../../shared/types.js';

export const NO_ANSWER_FALLBACK = 'I could not generate an answer for your question. Please try rephrasing it.';

const DOCUMENT_EXTENSIONS = /\.(pdf|docx?|md|txt|html?|pptx)$/i;

const documentSchema = z
  .object({
    title: z.string().nullish(),
    source: z.string().nullish(),
    page: z.number().nullish(),
    url: z.string().nullish()
  })
  .passthrough();

const payloadSchema = z
  .object({
    documents: z.array(z.unknown()).default([])
  })
  .passthrough();

export interface FinalizedTurn {
  answer: string;
  sources: Citation[];
}

export function fileBaseName(value: string): string {
  const segments = value.trim().split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

/** File name without directories or a document extension. */
export function normalizeSourceName(value: string): string {
  return fileBaseName(value).replace(DOCUMENT_EXTENSIONS, '').trim();
}

export function extractAnswer(history: readonly ConversationMessage[]): string {
  for (let index = history.length - 1; index >= 0; index -= 1) {
    const message = history[index];
    if (message.type === 'assistant' && !message.toolCalls?.length) {
      return message.content.trim() ? message.content : NO_ANSWER_FALLBACK;
    }
  }
  return NO_ANSWER_FALLBACK;
}

function parseDocuments(content: string): z.infer<typeof documentSchema>[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return [];
  }
  const payload = payloadSchema.safeParse(parsed);
  if (!payload.success) {
    return [];
  }
  return payload.data.documents.flatMap((entry) => {
    const document = documentSchema.safeParse(entry);
    return document.success ? [document.data] : [];
  });
}

/**
 * Citations for the current turn: documents from tool results after the most
 * recent human message whose normalized file name occurs in the answer.
 */
export function extractCitations(history: readonly ConversationMessage[], answer: string): Citation[] {
  const haystack = answer.toLowerCase();
  const seen = new Set<string>();
  const citations: Citation[] = [];

  for (let index = history.length - 1; index >= 0; index -= 1) {
    const message = history[index];
    if (message.type === 'human') {
      break;
    }
    if (message.type !== 'tool_result') {
      continue;
    }

    for (const document of parseDocuments(message.content)) {
      const sourceName = document.source || document.title || '';
      const normalized = normalizeSourceName(sourceName);
      if (!normalized || !haystack.includes(normalized.toLowerCase())) {
        continue;
      }

      const page = document.page ?? undefined;
      const key = JSON.stringify([normalized.toLowerCase(), page ?? null]);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const citation: Citation = { title: fileBaseName(sourceName) };
      if (page !== undefined) citation.page = page;
      if (document.url) citation.url = document.url;
      citations.push(citation);
    }
  }

  return citations;
}

export function finalizeTurn(history: readonly ConversationMessage[]): FinalizedTurn {
  const answer = extractAnswer(history);
  if (answer === NO_ANSWER_FALLBACK) {
    console.warn(JSON.stringify({ event: 'finalize.no_answer', messages: history.length }));
  }
  return { answer, sources: extractCitations(history, answer) };
}
