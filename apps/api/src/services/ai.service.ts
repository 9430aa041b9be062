import { GoogleGenerativeAI } from '@google/generative-ai';

/**
 * A model that answers with a single JSON document
 */
export interface StructuredModel {
  generateJson(instruction: string, input: string): Promise<string>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface AIServiceOptions {
  apiKey: string;
  model?: string;
  embeddingModel?: string;
}

export class AIService implements StructuredModel, Embedder {
  private client: GoogleGenerativeAI;
  private model: string;
  private embeddingModel: string;

  constructor(options: AIServiceOptions) {
    this.client = new GoogleGenerativeAI(options.apiKey);
    this.model = options.model ?? 'gemini-2.0-flash';
    this.embeddingModel = options.embeddingModel ?? 'text-embedding-004';
    console.log(`[AI] Service enabled (Gemini ${this.model}, embeddings ${this.embeddingModel})`);
  }

  /**
   * Call Gemini in JSON output mode with a fixed system instruction
   */
  async generateJson(instruction: string, input: string): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: instruction,
      generationConfig: {
        responseMimeType: 'application/json',
        temperature: 0,
      },
    });
    const result = await model.generateContent(input);
    return result.response.text();
  }

  async embed(text: string): Promise<number[]> {
    const model = this.client.getGenerativeModel({ model: this.embeddingModel });
    const result = await model.embedContent(text);

    if (result.embedding.values.length === 0) {
      throw new Error('Failed to generate embedding: empty vector');
    }
    return result.embedding.values;
  }
}
