/**
 * Documents HTTP Controller
 *
 * - POST /documents              index (or re-index) one preprocessed document
 * - GET  /documents/collections  point counts per configured collection
 */

import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Logger,
  Post,
  ServiceUnavailableException,
  ValidationPipe,
} from '@nestjs/common';
import { IndexUnavailableError, InputError } from '../common/errors';
import { IndexDocumentDto } from './dto/index-document.dto';
import {
  IndexingService,
  type CollectionInfo,
  type IndexDocumentResult,
} from './services/indexing.service';

@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(private readonly indexingService: IndexingService) {}

  @Post()
  async index(
    @Body(ValidationPipe) body: IndexDocumentDto,
  ): Promise<IndexDocumentResult> {
    try {
      return await this.indexingService.indexDocument(body);
    } catch (error) {
      if (error instanceof InputError) {
        throw new BadRequestException(error.message);
      }
      if (error instanceof IndexUnavailableError) {
        this.logger.error(`Indexing ${body.documentId} failed: ${error.message}`);
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }

  @Get('collections')
  async collections(): Promise<CollectionInfo[]> {
    try {
      return await this.indexingService.collectionInfo();
    } catch (error) {
      if (error instanceof IndexUnavailableError) {
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }
}
