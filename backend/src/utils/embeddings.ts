import { linkAbortSignals, withRetry } from './resilience.js';
import { createEmbeddings } from '../azure/openaiClient.js';

const MAX_CACHE_ENTRIES = 500;
const CACHE = new Map<string, number[]>();

interface EmbedOptions {
  signal?: AbortSignal;
}

function cacheKey(text: string): string {
  return text.trim().slice(0, 2048);
}

function remember(key: string, vector: number[]) {
  CACHE.set(key, vector);
  if (CACHE.size <= MAX_CACHE_ENTRIES) {
    return;
  }
  // Map iteration order is insertion order; evict the oldest entries
  const overflow = CACHE.size - MAX_CACHE_ENTRIES;
  const keys = CACHE.keys();
  for (let index = 0; index < overflow; index += 1) {
    const next = keys.next();
    if (next.done) {
      break;
    }
    CACHE.delete(next.value);
  }
}

export async function embedText(text: string, options: EmbedOptions = {}): Promise<number[]> {
  const key = cacheKey(text);
  const hit = CACHE.get(key);
  if (hit) {
    return hit;
  }

  const vector = await withRetry('embeddings.query', async (retrySignal) => {
    const controller = new AbortController();
    const unlink = linkAbortSignals(controller, retrySignal, options.signal);

    try {
      const response = await createEmbeddings(text, undefined, { signal: controller.signal });
      const embedding = response.data[0]?.embedding;
      if (!embedding?.length) {
        throw new Error('Embedding response did not contain a vector');
      }
      return embedding;
    } finally {
      unlink();
    }
  });

  remember(key, vector);
  return vector;
}

export function clearEmbeddingCache() {
  CACHE.clear();
}
