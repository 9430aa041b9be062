import { Pinecone, type Index } from '@pinecone-database/pinecone';
import type { VcRecord } from '@vc-scout/shared';
import type { VcIndex, VcIndexMatch } from '../services/vc-store.service.js';

export interface PineconeConfig {
  apiKey: string;
  indexName: string;
  indexHost?: string;
}

/** The slice of the Pinecone index client this adapter calls */
export type PineconeIndexClient = Pick<Index<VcRecord>, 'listPaginated' | 'fetch' | 'upsert' | 'query'>;

/**
 * VcIndex over a Pinecone index whose metadata holds the four record fields
 */
export class PineconeVcIndex implements VcIndex {
  constructor(private index: PineconeIndexClient) {}

  async listNames(): Promise<string[]> {
    const names: string[] = [];
    let paginationToken: string | undefined;

    do {
      const page = await this.index.listPaginated({ paginationToken });
      const ids = (page.vectors ?? [])
        .map((vector) => vector.id)
        .filter((id): id is string => typeof id === 'string');

      if (ids.length > 0) {
        const fetched = await this.index.fetch(ids);
        for (const record of Object.values(fetched.records)) {
          const name = record.metadata?.vc_name;
          if (name) {
            names.push(name);
          }
        }
      }

      paginationToken = page.pagination?.next;
    } while (paginationToken);

    return names;
  }

  async insert(id: string, values: number[], record: VcRecord): Promise<void> {
    await this.index.upsert([{ id, values, metadata: record }]);
  }

  async query(values: number[], topK: number): Promise<VcIndexMatch[]> {
    const response = await this.index.query({
      vector: values,
      topK,
      includeMetadata: true,
    });

    return (response.matches ?? []).map((match) => ({
      id: match.id,
      score: match.score ?? 0,
      record: match.metadata ?? null,
    }));
  }
}

export function createPineconeIndex(config: PineconeConfig): PineconeVcIndex {
  const pinecone = new Pinecone({ apiKey: config.apiKey });
  const index = pinecone.index<VcRecord>(config.indexName, config.indexHost);
  console.log(`[Store] Using Pinecone index ${config.indexName}`);
  return new PineconeVcIndex(index);
}
