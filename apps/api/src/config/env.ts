import { z } from 'zod';

const numericString = (name: string) =>
  z.string().regex(/^\d+$/, `${name} must be a number`);

export const envSchema = z.object({
  GEMINI_API_KEY: z.string().min(1, 'GEMINI_API_KEY is required'),
  PINECONE_API_KEY: z.string().min(1, 'PINECONE_API_KEY is required'),
  PINECONE_INDEX_NAME: z.string().min(1).default('venture-capital'),
  PINECONE_INDEX_HOST: z.string().url('PINECONE_INDEX_HOST must be a URL').optional(),
  USER_AGENT: z.string().min(1, 'USER_AGENT is required'),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  GEMINI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-004'),
  SCRAPE_TIMEOUT_MS: numericString('SCRAPE_TIMEOUT_MS').default('15000').transform(Number),
  PROCESS_RATE_LIMIT_PER_MINUTE: numericString('PROCESS_RATE_LIMIT_PER_MINUTE')
    .default('20')
    .transform(Number),
  CORS_ORIGIN: z.string().min(1).optional(),
  PORT: numericString('PORT').default('8000').transform(Number),
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate the process environment once at boot. Prints every issue and
 * exits when anything required is missing.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (result.success) {
    console.log('✅ Environment variables validated successfully');
    return result.data;
  }

  console.error('❌ CRITICAL: Environment validation failed:');
  result.error.errors.forEach((err) => {
    console.error(`   - ${err.path.join('.')}: ${err.message}`);
  });
  console.error('\n💡 Please check your .env file and ensure all required variables are set.');
  console.error('   See .env.example for reference.\n');
  process.exit(1);
}
