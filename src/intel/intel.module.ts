import { Module } from '@nestjs/common';
import { DEDUP_CONFIG, loadDedupConfig } from './config/dedup.config';
import { VECTOR_STORE_PATH } from './config/intel.constants';
import { IntelController } from './intel.controller';
import { FeedSourceService } from './services/feed-source.service';
import { FingerprintService } from './services/fingerprint.service';
import { IntelClassifierService } from './services/intel-classifier.service';
import { IntelPipelineService } from './services/intel-pipeline.service';
import { IntelStorageService } from './services/intel-storage.service';
import { LlmClientService } from './services/llm-client.service';
import { LlmEmbeddingProvider } from './services/llm-embedding.provider';
import { NoveltyResolverService } from './services/novelty-resolver.service';
import { StoryMatcherService } from './services/story-matcher.service';
import { ThemeGroupingService } from './services/theme-grouping.service';
import { VectorMemoryService } from './services/vector-memory.service';
import { JsonFileVectorStore } from './stores/json-file-vector.store';
import { EMBEDDING_PROVIDER, VECTOR_STORE } from './stores/vector-store';

@Module({
  controllers: [IntelController],
  providers: [
    { provide: DEDUP_CONFIG, useFactory: () => loadDedupConfig() },
    {
      provide: VECTOR_STORE,
      useFactory: () => new JsonFileVectorStore(VECTOR_STORE_PATH),
    },
    { provide: EMBEDDING_PROVIDER, useClass: LlmEmbeddingProvider },
    LlmClientService,
    FingerprintService,
    StoryMatcherService,
    VectorMemoryService,
    NoveltyResolverService,
    ThemeGroupingService,
    IntelClassifierService,
    FeedSourceService,
    IntelStorageService,
    IntelPipelineService,
  ],
  exports: [IntelPipelineService, IntelStorageService],
})
export class IntelModule {}
