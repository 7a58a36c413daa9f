/**
 * Metadata filter predicates, shared by the index pre-filter and the
 * retriever's post-filter. A missing field never matches.
 */

import type {
  DocumentMetadata,
  FilterValue,
  MetadataField,
  MetadataFilters,
} from '../types';

export interface FilterPredicate {
  field: MetadataField;
  accepted: FilterValue[];
}

/**
 * Normalize filters to predicates; undefined values and empty sets impose no constraint
 */
export function filterPredicates(filters: MetadataFilters = {}): FilterPredicate[] {
  const predicates: FilterPredicate[] = [];

  for (const [field, value] of Object.entries(filters)) {
    if (value === undefined || !isMetadataField(field)) {
      continue;
    }
    const accepted = Array.isArray(value) ? value : [value];
    if (accepted.length > 0) {
      predicates.push({ field, accepted });
    }
  }

  return predicates;
}

export function matchesFilters(
  metadata: DocumentMetadata,
  predicates: FilterPredicate[],
): boolean {
  return predicates.every(({ field, accepted }) => {
    const value = metadata[field];
    return value !== undefined && accepted.includes(value);
  });
}

const METADATA_FIELDS: ReadonlySet<string> = new Set<MetadataField>([
  'source',
  'crimeType',
  'offenderType',
  'victimology',
  'modusOperandi',
  'signatureBehavior',
  'geography',
  'timePeriod',
  'sourceReliability',
  'documentAuthority',
  'publicationYear',
]);

export function isMetadataField(field: string): field is MetadataField {
  return METADATA_FIELDS.has(field);
}

/**
 * Filters as they arrive from a caller, before field names are checked
 */
export type RawFilters = Record<string, FilterValue | FilterValue[] | undefined>;

export function partitionFilters(raw: RawFilters): {
  filters: MetadataFilters;
  unknownFields: string[];
} {
  const filters: MetadataFilters = {};
  const unknownFields: string[] = [];

  for (const [field, value] of Object.entries(raw)) {
    if (isMetadataField(field)) {
      filters[field] = value;
    } else {
      unknownFields.push(field);
    }
  }

  return { filters, unknownFields };
}

export function isFilterValue(value: unknown): value is FilterValue {
  return (
    typeof value === 'string' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}
