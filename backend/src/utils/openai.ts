import type { ToolCall } from '../../../shared/types.js';
import type { AzureResponseOutput, OutputItem } from '../azure/openaiClient.js';

const SECRET_PATTERNS: Array<[RegExp, string]> = [
  [/("?api-key"?\s*[:=]\s*"?)[^"\s,}]+/gi, '$1[REDACTED]'],
  [/(Bearer\s+)[A-Za-z0-9\-._~+/]+=*/g, '$1[REDACTED]'],
  [/([?&](?:sig|key|code)=)[^&\s"]+/gi, '$1[REDACTED]']
];

export function sanitizeLogMessage(message: string, maxLength = 500): string {
  let sanitized = message;
  for (const [pattern, replacement] of SECRET_PATTERNS) {
    sanitized = sanitized.replace(pattern, replacement);
  }
  return truncate(sanitized, maxLength);
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, maxLength)}…`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectMessageText(item: OutputItem, buffer: string[]) {
  if (!Array.isArray(item.content)) {
    return;
  }
  for (const part of item.content) {
    if ((part.type === 'output_text' || part.type === 'text') && typeof part.text === 'string') {
      buffer.push(part.text);
    }
  }
}

/**
 * Text the model addressed to the user. Function call arguments and reasoning
 * items are not part of it.
 */
export function extractOutputText(response: Pick<AzureResponseOutput, 'output' | 'output_text'>): string {
  if (typeof response.output_text === 'string' && response.output_text.length > 0) {
    return response.output_text;
  }

  const buffer: string[] = [];
  for (const item of response.output ?? []) {
    if (item.type === 'message') {
      collectMessageText(item, buffer);
    }
  }
  return buffer.join('');
}

export function parseToolArguments(raw: unknown): Record<string, unknown> {
  if (isRecord(raw)) {
    return raw;
  }
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      return parsed;
    }
    return { input: typeof parsed === 'string' ? parsed : raw };
  } catch {
    // Keep the raw text so the tool node can still normalize it
    return { input: raw };
  }
}

export function extractToolCalls(response: Pick<AzureResponseOutput, 'output'>): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const item of response.output ?? []) {
    if (item.type !== 'function_call') {
      continue;
    }
    const id = typeof item.call_id === 'string' ? item.call_id : typeof item.id === 'string' ? item.id : '';
    const name = typeof item.name === 'string' ? item.name : '';
    calls.push({ id, name, arguments: parseToolArguments(item.arguments) });
  }
  return calls;
}
