import { Module } from '@nestjs/common';
import { ChunkerService } from './chunker.service';
import {
  CONTENT_CLASSIFIER,
  KeywordContentClassifier,
} from './classifiers/content-classifier';
import {
  TOKEN_COUNTER,
  TokenCounterService,
} from './services/token-counter.service';

@Module({
  providers: [
    ChunkerService,
    TokenCounterService,
    { provide: TOKEN_COUNTER, useExisting: TokenCounterService },
    {
      provide: CONTENT_CLASSIFIER,
      useFactory: () => new KeywordContentClassifier(),
    },
  ],
  exports: [ChunkerService, TOKEN_COUNTER],
})
export class ChunkingModule {}
