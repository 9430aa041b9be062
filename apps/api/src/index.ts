import dotenv from 'dotenv';

import { createApp } from './app.js';
import { loadEnv } from './config/env.js';
import { AIService } from './services/ai.service.js';
import { ScraperService } from './services/scraper.service.js';
import { VcExtractorService } from './services/vc-extractor.service.js';
import { VcPipelineService } from './services/vc-pipeline.service.js';
import { VcStoreService } from './services/vc-store.service.js';
import { createPineconeIndex } from './utils/pinecone.js';

dotenv.config();

const env = loadEnv();

// Process-wide clients, shared by every request
const aiService = new AIService({
  apiKey: env.GEMINI_API_KEY,
  model: env.GEMINI_MODEL,
  embeddingModel: env.GEMINI_EMBEDDING_MODEL,
});
const vcIndex = createPineconeIndex({
  apiKey: env.PINECONE_API_KEY,
  indexName: env.PINECONE_INDEX_NAME,
  indexHost: env.PINECONE_INDEX_HOST,
});

const pipeline = new VcPipelineService({
  scraper: new ScraperService({ userAgent: env.USER_AGENT, timeoutMs: env.SCRAPE_TIMEOUT_MS }),
  extractor: new VcExtractorService(aiService),
  store: new VcStoreService(vcIndex, aiService),
});

const app = createApp({
  pipeline,
  corsOrigin: env.CORS_ORIGIN,
  rateLimitPerMinute: env.PROCESS_RATE_LIMIT_PER_MINUTE,
});

// Start server
const server = app.listen(env.PORT, () => {
  console.log(`🚀 API server running on http://localhost:${env.PORT}`);
  console.log(`📊 Environment: ${env.NODE_ENV ?? 'development'}`);
});

const shutdown = (signal: string): void => {
  console.log(`\n🛑 ${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      console.error('Error while closing server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
