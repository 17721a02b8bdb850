import { Injectable } from '@nestjs/common';
import { EmbeddingUnavailableError } from '../errors/intel.errors';
import { EmbeddingProvider } from '../stores/vector-store';
import { LlmClientService } from './llm-client.service';

const EMBED_ATTEMPTS = 2;

@Injectable()
export class LlmEmbeddingProvider implements EmbeddingProvider {
  constructor(private readonly llmClient: LlmClientService) {}

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new EmbeddingUnavailableError('empty text');
    }
    for (let attempt = 1; attempt <= EMBED_ATTEMPTS; attempt += 1) {
      const vector = await this.llmClient.getEmbedding(text);
      if (vector && vector.length > 0) {
        return vector;
      }
    }
    throw new EmbeddingUnavailableError(`no vector after ${EMBED_ATTEMPTS} attempts`);
  }
}
