/**
 * Citation Formatter
 * Turns generation output plus the documents used into a cited answer.
 * Pure: the same input always yields byte-identical output.
 */

import { Injectable } from '@nestjs/common';
import { FormatError } from '../../common/errors';
import type { CitationRecord, RetrievedDocument } from '../types';
import { documentName } from '../utils/document-name';

export const SOURCES_HEADING = '\n\n---\n\n**Sources:**\n\n';

const PREVIEW_LENGTH = 200;
const DOCUMENT_MARKER_REGEX = /\[Document (\d+)(?: - Source: [^\]\n]*)?\]/g;

export interface FormattedResponse {
  text: string;
  citations: CitationRecord[];
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * One record per unique document name, numbered by first appearance
 */
export function buildCitations(sources: RetrievedDocument[]): {
  citations: CitationRecord[];
  referenceOf: number[];
} {
  const citations: CitationRecord[] = [];
  const byName = new Map<string, CitationRecord>();
  const referenceOf: number[] = [];

  for (const { chunk } of sources) {
    const name = documentName(chunk);
    let record = byName.get(name);

    if (!record) {
      const { documentAuthority, sourceReliability, publicationYear, crimeType } =
        chunk.metadata;
      record = {
        referenceNumber: citations.length + 1,
        documentName: name,
        sourceDocumentId: chunk.documentId,
        ...(documentAuthority !== undefined && { authority: documentAuthority }),
        ...(sourceReliability !== undefined && { reliability: sourceReliability }),
        ...(publicationYear !== undefined && { publicationYear }),
        ...(crimeType !== undefined && { crimeType }),
        chunkIds: [],
        preview: preview(chunk.text),
      };
      byName.set(name, record);
      citations.push(record);
    }

    if (!record.chunkIds.includes(chunk.chunkId)) {
      record.chunkIds.push(chunk.chunkId);
    }
    referenceOf.push(record.referenceNumber);
  }

  return { citations, referenceOf };
}

export function formatReference(citation: CitationRecord): string {
  const details = [
    citation.authority,
    citation.reliability !== undefined ? `reliability: ${citation.reliability}` : undefined,
    citation.publicationYear !== undefined ? String(citation.publicationYear) : undefined,
    citation.crimeType !== undefined ? `crime type: ${citation.crimeType}` : undefined,
  ].filter((detail): detail is string => detail !== undefined && detail.length > 0);

  const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
  return `${citation.referenceNumber}. ${citation.documentName}${suffix}`;
}

@Injectable()
export class CitationFormatterService {
  /**
   * @param sources documents actually used for generation, in context order
   * @throws FormatError on an empty body or a marker outside the used set
   */
  format(responseText: string, sources: RetrievedDocument[]): FormattedResponse {
    const body = responseText.trim();
    if (body.length === 0) {
      throw new FormatError('Generation output is empty');
    }

    const { citations, referenceOf } = buildCitations(sources);

    const cited = body.replace(DOCUMENT_MARKER_REGEX, (_marker, position: string) => {
      const reference = referenceOf[Number(position) - 1];
      if (reference === undefined) {
        throw new FormatError(
          `Citation marker [Document ${position}] does not match any of the ${sources.length} documents used`,
        );
      }
      return `[${reference}]`;
    });

    if (citations.length === 0) {
      return { text: cited, citations };
    }

    const references = citations.map(formatReference).join('\n');
    return { text: `${cited}${SOURCES_HEADING}${references}`, citations };
  }
}
