/**
 * Index Document DTO
 * One preprocessed document: normalized text plus document-level metadata
 */

import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import type { SourceReliability } from '../types';

export class DocumentMetadataDto {
  @IsOptional()
  @IsString()
  declare source?: string;

  @IsOptional()
  @IsString()
  declare crimeType?: string;

  @IsOptional()
  @IsString()
  declare offenderType?: string;

  @IsOptional()
  @IsString()
  declare victimology?: string;

  @IsOptional()
  @IsString()
  declare modusOperandi?: string;

  @IsOptional()
  @IsString()
  declare signatureBehavior?: string;

  @IsOptional()
  @IsString()
  declare geography?: string;

  @IsOptional()
  @IsString()
  declare timePeriod?: string;

  @IsOptional()
  @IsIn(['high', 'medium', 'low'])
  declare sourceReliability?: SourceReliability;

  @IsOptional()
  @IsString()
  declare documentAuthority?: string;

  @IsOptional()
  @IsInt()
  declare publicationYear?: number;
}

export class IndexDocumentDto {
  @IsString()
  @IsNotEmpty()
  declare documentId: string;

  @IsString()
  @IsNotEmpty()
  declare text: string;

  /** Routed from documentType and metadata.crimeType when omitted */
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  declare collection?: string;

  /** e.g. "case study", "theory", "legislation", "technique" */
  @IsOptional()
  @IsString()
  declare documentType?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => DocumentMetadataDto)
  declare metadata?: DocumentMetadataDto;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare targetTokens?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(0.5)
  declare overlapRatio?: number;
}
