/**
 * Retrieval Module
 * HTTP surface for querying and indexing
 */

import { Module } from '@nestjs/common';
import { ChunkingModule } from '../chunking/chunking.module';
import { DocumentsController } from './documents.controller';
import { RetrievalController } from './retrieval.controller';
import { IndexingService } from './services/indexing.service';
import { WorkflowModule } from './workflow/workflow.module';

@Module({
  imports: [WorkflowModule, ChunkingModule],
  providers: [IndexingService],
  controllers: [RetrievalController, DocumentsController],
})
export class RetrievalModule {}
