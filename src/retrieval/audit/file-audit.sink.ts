/**
 * File Audit Sink
 * Appends one JSON line per query to `${AUDIT_LOG_DIR}/queries_YYYYMMDD.jsonl`
 * and one per indexed document to `ingestion_YYYYMMDD.jsonl`.
 * Lookups scan the query files newest day first.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { appendFile, mkdir, readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from '../../common/errors';
import { PIPELINE_CONFIG, type PipelineConfig } from '../../config/pipeline.config';
import {
  storedAuditRecordSchema,
  summarizeAuditRecord,
  type AuditRecord,
  type AuditSink,
  type AuditSummary,
  type IngestionAuditRecord,
  type StoredAuditRecord,
} from './audit.types';

type AuditLogKind = 'queries' | 'ingestion';

const QUERY_FILE_PATTERN = /^queries_\d{8}\.jsonl$/;

export function auditFileName(timestamp: string, kind: AuditLogKind = 'queries'): string {
  const day = timestamp.slice(0, 10).replace(/-/g, '');
  return `${kind}_${day}.jsonl`;
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

@Injectable()
export class FileAuditSink implements AuditSink {
  private readonly logger = new Logger(FileAuditSink.name);
  private directoryReady: Promise<string | undefined> | null = null;

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  async write(record: AuditRecord): Promise<void> {
    const file = await this.append('queries', record.timestamp, record);
    this.logger.log(`Audit record ${record.auditId} written to ${file}`);
  }

  async writeIngestion(record: IngestionAuditRecord): Promise<void> {
    const file = await this.append('ingestion', record.timestamp, record);
    this.logger.log(`Ingestion of ${record.documentId} logged to ${file}`);
  }

  async find(auditId: string): Promise<StoredAuditRecord | null> {
    for (const file of await this.queryFiles()) {
      const match = (await this.readRecords(file)).find(
        (record) => record.auditId === auditId,
      );
      if (match) {
        return match;
      }
    }
    return null;
  }

  async listRecent(limit: number): Promise<AuditSummary[]> {
    const summaries: AuditSummary[] = [];
    for (const file of await this.queryFiles()) {
      const records = (await this.readRecords(file)).reverse();
      for (const record of records) {
        if (summaries.length >= limit) {
          return summaries;
        }
        summaries.push(summarizeAuditRecord(record));
      }
    }
    return summaries;
  }

  private async append(kind: AuditLogKind, timestamp: string, entry: object): Promise<string> {
    const directory = this.config.audit.logDir;
    if (!this.directoryReady) {
      this.directoryReady = mkdir(directory, { recursive: true }).catch(
        (error: unknown) => {
          this.directoryReady = null;
          throw error;
        },
      );
    }
    await this.directoryReady;

    const file = join(directory, auditFileName(timestamp, kind));
    await appendFile(file, `${JSON.stringify(entry)}\n`, 'utf-8');
    return file;
  }

  /** Query log files, newest day first */
  private async queryFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.config.audit.logDir);
    } catch (error) {
      if (isMissingDirectory(error)) {
        return [];
      }
      throw error;
    }
    return names
      .filter((name) => QUERY_FILE_PATTERN.test(name))
      .sort()
      .reverse()
      .map((name) => join(this.config.audit.logDir, name));
  }

  /** Records of one file in write order; unreadable lines are skipped */
  private async readRecords(file: string): Promise<StoredAuditRecord[]> {
    const content = await readFile(file, 'utf-8');
    const records: StoredAuditRecord[] = [];

    for (const line of content.split('\n')) {
      if (line.trim().length === 0) {
        continue;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        this.logger.warn(`Skipping malformed audit line in ${file}: ${errorMessage(error)}`);
        continue;
      }
      const record = storedAuditRecordSchema.safeParse(parsed);
      if (record.success) {
        records.push(record.data);
      } else {
        this.logger.warn(`Skipping audit line without query fields in ${file}`);
      }
    }
    return records;
  }
}
