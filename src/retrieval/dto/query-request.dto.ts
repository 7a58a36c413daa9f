/**
 * Query Request DTO
 * Input for the pipeline: question plus optional run options
 */

import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import type { RawFilters } from '../utils/metadata-filter';
import { IsMetadataFilters } from './is-metadata-filters.validator';

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  declare query: string;

  /** Clamped to the configured bounds */
  @IsOptional()
  @IsInt()
  declare k?: number;

  @IsOptional()
  @IsBoolean()
  declare useReranker?: boolean;

  @IsOptional()
  @IsMetadataFilters()
  declare filters?: RawFilters;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  declare diversityLambda?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare maxContextTokens?: number;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  declare collections?: string[];
}
