/**
 * Pipeline Configuration
 * Typed, validated view over ConfigService. Built once at bootstrap and
 * injected through PIPELINE_CONFIG.
 */

import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

const DEFAULT_COLLECTIONS = [
  'criminology_theory',
  'forensic_cases',
  'serial_killers',
  'legislation',
  'investigation_techniques',
];

const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === 'boolean' ? value : value.trim().toLowerCase() === 'true',
  );

const collectionList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  )
  .pipe(z.array(z.string()).min(1));

const pipelineConfigSchema = z
  .object({
    index: z.object({
      collections: collectionList,
      timeoutMs: z.coerce.number().int().min(0),
    }),
    retrieval: z.object({
      defaultK: z.coerce.number().int().min(1),
      minK: z.coerce.number().int().min(1),
      maxK: z.coerce.number().int().min(1),
      oversampleFactor: z.coerce.number().min(1),
      diversityLambda: z.coerce.number().min(0).max(1),
    }),
    reranking: z.object({
      enabled: booleanFromEnv,
      topN: z.coerce.number().int().min(1).optional(),
    }),
    generation: z.object({
      maxTokens: z.coerce.number().int().min(1),
      temperature: z.coerce.number().min(0).max(2),
      timeoutMs: z.coerce.number().int().min(0),
      maxRetries: z.coerce.number().int().min(0),
      retryBaseDelayMs: z.coerce.number().int().min(0),
      retryMaxDelayMs: z.coerce.number().int().min(0),
      maxContextTokens: z.coerce.number().int().min(1),
    }),
    chunking: z.object({
      targetTokens: z.coerce.number().int().min(1),
      overlapRatio: z.coerce.number().min(0).max(0.5),
      boundaryTolerance: z.coerce.number().min(0).max(0.5),
    }),
    audit: z.object({
      enabled: booleanFromEnv,
      logDir: z.string().min(1),
    }),
  })
  .refine((config) => config.retrieval.minK <= config.retrieval.maxK, {
    message: 'RETRIEVAL_MIN_K must not exceed RETRIEVAL_MAX_K',
    path: ['retrieval', 'minK'],
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

/**
 * Build the pipeline configuration from environment-backed ConfigService
 * @throws Error listing every invalid setting
 */
export function loadPipelineConfig(configService: ConfigService): PipelineConfig {
  const topN = configService.get<string>('RERANK_TOP_N');

  const raw = {
    index: {
      collections: configService.get<string>(
        'QDRANT_COLLECTIONS',
        DEFAULT_COLLECTIONS.join(','),
      ),
      timeoutMs: configService.get<string>('INDEX_TIMEOUT_MS', '10000'),
    },
    retrieval: {
      defaultK: configService.get<string>('RETRIEVAL_DEFAULT_K', '5'),
      minK: configService.get<string>('RETRIEVAL_MIN_K', '3'),
      maxK: configService.get<string>('RETRIEVAL_MAX_K', '10'),
      oversampleFactor: configService.get<string>(
        'RETRIEVAL_OVERSAMPLE_FACTOR',
        '3',
      ),
      diversityLambda: configService.get<string>('MMR_DIVERSITY', '0.5'),
    },
    reranking: {
      enabled: configService.get<string>('USE_RERANKER', 'false'),
      topN: topN === undefined || topN === '' ? undefined : topN,
    },
    generation: {
      maxTokens: configService.get<string>('GENERATION_MAX_TOKENS', '1200'),
      temperature: configService.get<string>('GENERATION_TEMPERATURE', '0.3'),
      timeoutMs: configService.get<string>('GENERATION_TIMEOUT_MS', '60000'),
      maxRetries: configService.get<string>('GENERATION_MAX_RETRIES', '3'),
      retryBaseDelayMs: configService.get<string>(
        'GENERATION_RETRY_BASE_DELAY_MS',
        '1000',
      ),
      retryMaxDelayMs: configService.get<string>(
        'GENERATION_RETRY_MAX_DELAY_MS',
        '60000',
      ),
      maxContextTokens: configService.get<string>('MAX_CONTEXT_TOKENS', '6000'),
    },
    chunking: {
      targetTokens: configService.get<string>('CHUNK_TARGET_TOKENS', '650'),
      overlapRatio: configService.get<string>('CHUNK_OVERLAP_RATIO', '0.15'),
      boundaryTolerance: configService.get<string>(
        'CHUNK_BOUNDARY_TOLERANCE',
        '0.2',
      ),
    },
    audit: {
      enabled: configService.get<string>('AUDIT_ENABLED', 'true'),
      logDir: configService.get<string>('AUDIT_LOG_DIR', './logs/audit'),
    },
  };

  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pipeline configuration: ${issues}`);
  }

  return parsed.data;
}

/**
 * Nest provider for PIPELINE_CONFIG
 */
export const pipelineConfigProvider = {
  provide: PIPELINE_CONFIG,
  useFactory: (configService: ConfigService): PipelineConfig =>
    loadPipelineConfig(configService),
  inject: [ConfigService],
};
