import type { ProcessUrlResponse } from '@vc-scout/shared';
import { buildProcessMessage, formatVcRecord } from '../utils/format.js';
import type { ScraperService } from './scraper.service.js';
import type { VcExtractorService } from './vc-extractor.service.js';
import type { VcStoreService } from './vc-store.service.js';

export interface VcPipelineDeps {
  scraper: Pick<ScraperService, 'scrape'>;
  extractor: Pick<VcExtractorService, 'extract'>;
  store: Pick<VcStoreService, 'insertIfAbsent' | 'findSimilar'>;
}

export const SIMILAR_FIRMS_LIMIT = 3;

/**
 * Runs one URL through scrape, extraction, dedup insert and similarity
 * lookup. Each step either completes or throws; nothing is retried.
 */
export class VcPipelineService {
  constructor(private deps: VcPipelineDeps) {}

  async process(url: string): Promise<ProcessUrlResponse> {
    console.log(`[Pipeline] Fetching ${url}`);
    const pageText = await this.deps.scraper.scrape(url);

    console.log(`[Pipeline] Extracting info from ${pageText.length} characters`);
    const record = await this.deps.extractor.extract(pageText);

    console.log(`[Pipeline] Checking store for ${record.vc_name}`);
    const { inserted, id } = await this.deps.store.insertIfAbsent(record);

    console.log('[Pipeline] Querying similar firms');
    const similar = await this.deps.store.findSimilar(record, SIMILAR_FIRMS_LIMIT);

    const summary = formatVcRecord(record, url);
    return {
      message: buildProcessMessage(summary, similar),
      record,
      similar,
      inserted,
      id,
    };
  }
}
