import { describe, it, expect } from 'vitest';
import type { VcRecord } from '@vc-scout/shared';
import { makeRecord } from '../test/fakes.js';
import { PineconeVcIndex, type PineconeIndexClient } from './pinecone.js';

type ListPage = Awaited<ReturnType<PineconeIndexClient['listPaginated']>>;

/** Pinecone client stand-in serving fixed list pages and metadata by id */
function stubIndex(pages: ListPage[], metadata: Map<string, VcRecord | undefined>) {
  const calls: {
    listTokens: Array<string | undefined>;
    fetchedIds: string[][];
    upserts: unknown[];
    queries: unknown[];
  } = { listTokens: [], fetchedIds: [], upserts: [], queries: [] };
  let pageIndex = 0;

  const client: PineconeIndexClient = {
    listPaginated: async (options) => {
      calls.listTokens.push(options?.paginationToken);
      const page = pages[pageIndex];
      pageIndex += 1;
      if (!page) {
        throw new Error('listed past the last page');
      }
      return page;
    },
    fetch: async (ids) => {
      calls.fetchedIds.push(ids);
      const records = Object.fromEntries(
        ids.map((id) => [id, { id, values: [], metadata: metadata.get(id) }]),
      );
      return { records, namespace: '' };
    },
    upsert: async (records) => {
      calls.upserts.push(records);
    },
    query: async (options) => {
      calls.queries.push(options);
      return {
        matches: [
          { id: 'acme', values: [], score: 0.92, metadata: makeRecord() },
          { id: 'bare', values: [] },
        ],
        namespace: '',
      };
    },
  };

  return { client, calls };
}

describe('PineconeVcIndex', () => {
  const ledger = makeRecord({ vc_name: 'Ledger Partners' });

  it('follows pagination tokens and skips records without a name', async () => {
    const { client, calls } = stubIndex(
      [
        { vectors: [{ id: 'acme' }, { id: 'bare' }], pagination: { next: 'page-2' } },
        { vectors: [{ id: 'ledger' }] },
      ],
      new Map([
        ['acme', makeRecord()],
        ['bare', undefined],
        ['ledger', ledger],
      ]),
    );

    const names = await new PineconeVcIndex(client).listNames();

    expect(names).toEqual(['Acme Ventures', 'Ledger Partners']);
    expect(calls.listTokens).toEqual([undefined, 'page-2']);
    expect(calls.fetchedIds).toEqual([['acme', 'bare'], ['ledger']]);
  });

  it('does not fetch metadata for an empty index', async () => {
    const { client, calls } = stubIndex([{ vectors: [] }], new Map());

    expect(await new PineconeVcIndex(client).listNames()).toEqual([]);
    expect(calls.fetchedIds).toEqual([]);
  });

  it('upserts the record as metadata', async () => {
    const { client, calls } = stubIndex([], new Map());

    await new PineconeVcIndex(client).insert('record-id', [0.1, 0.2], ledger);

    expect(calls.upserts).toEqual([[{ id: 'record-id', values: [0.1, 0.2], metadata: ledger }]]);
  });

  it('maps query matches, defaulting a missing score to zero', async () => {
    const { client, calls } = stubIndex([], new Map());

    const matches = await new PineconeVcIndex(client).query([1, 0], 2);

    expect(calls.queries).toEqual([{ vector: [1, 0], topK: 2, includeMetadata: true }]);
    expect(matches).toEqual([
      { id: 'acme', score: 0.92, record: makeRecord() },
      { id: 'bare', score: 0, record: null },
    ]);
  });
});
