import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExtractionError, FetchError } from '../middleware/error-handler.js';
import { makeRecord } from '../test/fakes.js';
import { VcPipelineService } from './vc-pipeline.service.js';

describe('VcPipelineService', () => {
  const record = makeRecord();
  const scrape = vi.fn<(url: string) => Promise<string>>();
  const extract = vi.fn<(pageText: string) => Promise<typeof record>>();
  const insertIfAbsent = vi.fn();
  const findSimilar = vi.fn();

  const pipeline = new VcPipelineService({
    scraper: { scrape },
    extractor: { extract },
    store: { insertIfAbsent, findSimilar },
  });

  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('runs each step once and asks for three similar firms', async () => {
    scrape.mockResolvedValue('page text');
    extract.mockResolvedValue(record);
    insertIfAbsent.mockResolvedValue({ inserted: true, id: 'record-id' });
    findSimilar.mockResolvedValue([{ vcName: 'Ledger Partners', score: 0.7 }]);

    const result = await pipeline.process('https://example-vc.com');

    expect(extract).toHaveBeenCalledWith('page text');
    expect(insertIfAbsent).toHaveBeenCalledWith(record);
    expect(findSimilar).toHaveBeenCalledWith(record, 3);
    expect(result.inserted).toBe(true);
    expect(result.id).toBe('record-id');
    expect(result.message.endsWith(' \n Similar companies: Ledger Partners')).toBe(true);
  });

  it('stops before extraction when scraping fails', async () => {
    scrape.mockRejectedValue(new FetchError({ url: 'https://example-vc.com' }));

    await expect(pipeline.process('https://example-vc.com')).rejects.toBeInstanceOf(FetchError);
    expect(extract).not.toHaveBeenCalled();
    expect(insertIfAbsent).not.toHaveBeenCalled();
  });

  it('never touches the store when extraction fails', async () => {
    scrape.mockResolvedValue('page text');
    extract.mockRejectedValue(new ExtractionError());

    await expect(pipeline.process('https://example-vc.com')).rejects.toBeInstanceOf(ExtractionError);
    expect(insertIfAbsent).not.toHaveBeenCalled();
    expect(findSimilar).not.toHaveBeenCalled();
  });
});
