import { v5 as uuidv5 } from 'uuid';
import { serializeVcRecord, type SimilarFirm, type VcRecord } from '@vc-scout/shared';
import { StoreError, describeError } from '../middleware/error-handler.js';
import type { Embedder } from './ai.service.js';

// Fixed namespace so the same record content always maps to the same id
export const VC_RECORD_NAMESPACE = '6f1c2d3e-8a4b-5c6d-9e0f-1a2b3c4d5e6f';

export interface VcIndexMatch {
  id: string;
  score: number;
  record: Partial<VcRecord> | null;
}

/**
 * The collection of stored VC records. Backed by Pinecone in production.
 */
export interface VcIndex {
  /** Every stored `vc_name`, by full scan */
  listNames(): Promise<string[]>;
  insert(id: string, values: number[], record: VcRecord): Promise<void>;
  query(values: number[], topK: number): Promise<VcIndexMatch[]>;
}

export interface InsertResult {
  inserted: boolean;
  id: string | null;
}

export function computeVcRecordId(record: VcRecord): string {
  return uuidv5(serializeVcRecord(record), VC_RECORD_NAMESPACE);
}

export class VcStoreService {
  constructor(
    private index: VcIndex,
    private embedder: Embedder
  ) {}

  private async withStore<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      console.error(`[Store] ${operation} failed:`, describeError(error));
      throw new StoreError({ operation, reason: describeError(error) });
    }
  }

  async listNames(): Promise<string[]> {
    return this.withStore('listNames', () => this.index.listNames());
  }

  async exists(vcName: string): Promise<boolean> {
    const names = await this.listNames();
    return names.includes(vcName);
  }

  /**
   * Insert the record unless one with the same vc_name is already stored.
   * Only the name is compared; changes to other fields are not detected.
   */
  async insertIfAbsent(record: VcRecord): Promise<InsertResult> {
    if (await this.exists(record.vc_name)) {
      console.log(`[Store] ${record.vc_name} already stored, skipping insert`);
      return { inserted: false, id: null };
    }

    const id = computeVcRecordId(record);
    await this.withStore('insert', async () => {
      const values = await this.embedder.embed(serializeVcRecord(record));
      await this.index.insert(id, values, record);
    });

    console.log(`[Store] Inserted ${record.vc_name} (${id})`);
    return { inserted: true, id };
  }

  /**
   * Nearest stored firms to the record, in the order the index returns them
   */
  async findSimilar(record: VcRecord, limit = 3): Promise<SimilarFirm[]> {
    const matches = await this.withStore('findSimilar', async () => {
      const values = await this.embedder.embed(serializeVcRecord(record));
      return this.index.query(values, limit);
    });

    const similar: SimilarFirm[] = [];
    for (const match of matches) {
      const vcName = match.record?.vc_name;
      if (vcName) {
        similar.push({ vcName, score: match.score });
      }
    }
    return similar;
  }
}
