/**
 * Collection routing for documents indexed without an explicit collection
 */

export const DEFAULT_COLLECTION = 'forensic_cases';

export const COLLECTION_DESCRIPTIONS: Readonly<Record<string, string>> = {
  criminology_theory: 'General criminological theory',
  forensic_cases: 'Forensic cases and forensic medicine',
  serial_killers: 'Serial homicide studies',
  legislation: 'Comparative criminal legislation',
  investigation_techniques: 'Criminal investigation techniques',
};

export interface RoutingHints {
  /** Free-form document type, English or Spanish ("case study", "teoría") */
  documentType?: string;
  crimeType?: string;
}

const DOCUMENT_TYPE_ROUTES: ReadonlyArray<{ keywords: string[]; collection: string }> = [
  { keywords: ['theory', 'teoría', 'teoria'], collection: 'criminology_theory' },
  { keywords: ['case', 'caso'], collection: DEFAULT_COLLECTION },
  { keywords: ['legislation', 'legislación', 'legislacion'], collection: 'legislation' },
  { keywords: ['technique', 'técnica', 'tecnica'], collection: 'investigation_techniques' },
];

/**
 * First document-type keyword wins. Case files and untyped documents go to
 * serial_killers when the crime type mentions "serial", else forensic_cases.
 */
export function routeCollection(hints: RoutingHints): string {
  const documentType = hints.documentType?.toLowerCase() ?? '';
  const serial = (hints.crimeType?.toLowerCase() ?? '').includes('serial');

  const route = DOCUMENT_TYPE_ROUTES.find(({ keywords }) =>
    keywords.some((keyword) => documentType.includes(keyword)),
  );

  if (route && route.collection !== DEFAULT_COLLECTION) {
    return route.collection;
  }
  return serial ? 'serial_killers' : DEFAULT_COLLECTION;
}
