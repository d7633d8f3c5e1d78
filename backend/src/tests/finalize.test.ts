import { describe, expect, it } from 'vitest';
import type { ConversationMessage, RetrievedDocument } from '../../../shared/types.js';
import {
  extractAnswer,
  extractCitations,
  finalizeTurn,
  NO_ANSWER_FALLBACK,
  normalizeSourceName
} from '../orchestrator/finalize.js';
import { assistantMessage, humanMessage, toolResultMessage } from '../orchestrator/messages.js';

const searchCall = (id: string) => ({ id, name: 'search_technical_docs', arguments: { query: 'q' } });

const resultWith = (id: string, documents: RetrievedDocument[]) =>
  toolResultMessage(id, { content: 'context', documents });

describe('normalizeSourceName', () => {
  it('strips directories and document extensions', () => {
    expect(normalizeSourceName('docs/networking/vnet-overview.pdf')).toBe('vnet-overview');
    expect(normalizeSourceName('C:\\exports\\sql-security.docx')).toBe('sql-security');
    expect(normalizeSourceName('storage-tiers')).toBe('storage-tiers');
  });
});

describe('extractAnswer', () => {
  it('uses the most recent assistant message without tool calls', () => {
    const history: ConversationMessage[] = [
      humanMessage('q'),
      assistantMessage('first draft'),
      assistantMessage('', [searchCall('call_1')]),
      resultWith('call_1', []),
      assistantMessage('final answer')
    ];
    expect(extractAnswer(history)).toBe('final answer');
  });

  it('falls back when the answer is missing or blank', () => {
    expect(extractAnswer([humanMessage('q')])).toBe(NO_ANSWER_FALLBACK);
    expect(extractAnswer([humanMessage('q'), assistantMessage('   ')])).toBe(NO_ANSWER_FALLBACK);
  });
});

describe('extractCitations', () => {
  it('admits only documents whose name occurs in the answer, ignoring case', () => {
    const history: ConversationMessage[] = [
      humanMessage('How do I configure a VNet?'),
      assistantMessage('', [searchCall('call_1')]),
      resultWith('call_1', [
        { title: 'VNet overview', source: 'docs/VNet-Overview.pdf', page: 3, url: 'https://docs.example.com/vnet' },
        { title: 'Peering', source: 'docs/vnet-peering.pdf', page: 7 }
      ])
    ];

    expect(extractCitations(history, 'According to vnet-overview, page 3, you create a VNet first.')).toEqual([
      { title: 'VNet-Overview.pdf', page: 3, url: 'https://docs.example.com/vnet' }
    ]);
  });

  it('falls back to the title when a document has no source', () => {
    const history: ConversationMessage[] = [
      humanMessage('q'),
      resultWith('call_1', [{ title: 'Firewall rules' }])
    ];

    expect(extractCitations(history, 'See Firewall rules for details.')).toEqual([{ title: 'Firewall rules' }]);
  });

  it('deduplicates by name and page across results', () => {
    const history: ConversationMessage[] = [
      humanMessage('q'),
      resultWith('call_1', [{ source: 'nsg.pdf', page: 1 }, { source: 'nsg.pdf', page: 2 }]),
      resultWith('call_2', [{ source: 'archive/NSG.pdf', page: 1 }])
    ];

    expect(extractCitations(history, 'nsg covers it')).toEqual([
      { title: 'NSG.pdf', page: 1 },
      { title: 'nsg.pdf', page: 2 }
    ]);
  });

  it('keeps distinct name and page pairs apart even when their joined text matches', () => {
    const history: ConversationMessage[] = [
      humanMessage('q'),
      resultWith('call_1', [
        { source: 'vnet.pdf', page: -1 },
        { source: 'vnet-.pdf', page: 1 }
      ])
    ];

    expect(extractCitations(history, 'See vnet- and vnet.')).toEqual([
      { title: 'vnet.pdf', page: -1 },
      { title: 'vnet-.pdf', page: 1 }
    ]);
  });

  it('never reaches past the most recent human message', () => {
    const history: ConversationMessage[] = [
      humanMessage('How do I configure a VNet?'),
      assistantMessage('', [searchCall('call_1')]),
      resultWith('call_1', [{ source: 'vnet-overview.pdf', page: 1 }]),
      assistantMessage('Per vnet-overview ...'),
      humanMessage('How do I secure a SQL database?'),
      assistantMessage('', [searchCall('call_2')]),
      resultWith('call_2', [{ source: 'sql-security.pdf', page: 4 }])
    ];

    expect(extractCitations(history, 'Both vnet-overview and sql-security apply.')).toEqual([
      { title: 'sql-security.pdf', page: 4 }
    ]);
  });

  it('skips error payloads, unparsable content and nameless documents', () => {
    const history: ConversationMessage[] = [
      humanMessage('q'),
      { type: 'tool_result', toolCallId: 'call_1', content: 'not json' },
      toolResultMessage('call_2', { error: 'Tool execution failed', content: 'failed', documents: [] }),
      resultWith('call_3', [{ page: 2 }, { source: '.pdf' }])
    ];

    expect(extractCitations(history, 'not json failed .pdf')).toEqual([]);
  });
});

describe('finalizeTurn', () => {
  it('returns the answer with its citations', () => {
    const history: ConversationMessage[] = [
      humanMessage('q'),
      assistantMessage('', [searchCall('call_1')]),
      resultWith('call_1', [{ source: 'vnet-overview.pdf' }]),
      assistantMessage('Read vnet-overview.')
    ];

    expect(finalizeTurn(history)).toEqual({
      answer: 'Read vnet-overview.',
      sources: [{ title: 'vnet-overview.pdf' }]
    });
  });
});
