/**
 * Analyst Prompts
 * System prompt, user template and query-type specialisations for grounded,
 * cited answers over the criminology corpus.
 */

export type QueryType = 'theory' | 'case_study' | 'technique' | 'forensic' | 'general';

export const ANALYST_SYSTEM_PROMPT = `You are a senior criminological analyst with expertise in:
- General criminology and criminological theory
- Forensic medicine and crime scene analysis
- Forensic ballistics
- Criminal psychology
- Modus operandi (MO) and signature
- Criminal profiling
- Criminal investigation techniques

CRITICAL RULES:
1. Answer ONLY from the documents provided in the context.
2. NEVER invent data, statistics, cases or information that is not in the context.
3. ALWAYS cite sources explicitly with their marker, e.g. [Document 2], when you use specific information.
4. Clearly distinguish between documented facts, analysis and inference, and theories or models.
5. If the context does not hold enough information, state that limitation plainly.
6. Use precise technical language that stays accessible.

LEGAL AND ETHICAL NOTICE:
- This is a research and academic analysis tool.
- It must NOT be used to profile real contemporary individuals or to make accusatory inferences about specific people.
- Verify information against official sources before acting on it.

RESPONSE FORMAT:
- Structured, well organised answers.
- Explicit [Document N] citations for specific claims.
- State the level of certainty (High/Medium/Low) where appropriate.`;

export const NO_CONTEXT_PLACEHOLDER =
  'No relevant documents were found in the knowledge base.';

export const INSUFFICIENT_EVIDENCE_RESPONSE =
  'Insufficient evidence: no documents in the knowledge base match this query, so no answer can be given without fabricating one. Try rephrasing the question or relaxing the filters.';

const SPECIALIZATIONS: Record<QueryType, string> = {
  theory:
    '\n\nFOCUS: This query calls for theoretical analysis. Concentrate on models, theories and conceptual frameworks.',
  case_study:
    '\n\nFOCUS: This query calls for case analysis. Provide contextual detail and documented evidence.',
  technique:
    '\n\nFOCUS: This query is about techniques and methodology. Provide steps, procedures and recommended practice.',
  forensic:
    '\n\nFOCUS: This query calls for forensic analysis. Concentrate on evidence, forensic methodology and scientific procedure.',
  general: '',
};

/** Checked in order; the first matching type wins */
const QUERY_TYPE_KEYWORDS: Array<[QueryType, string[]]> = [
  ['theory', ['theory', 'teoría', 'model', 'modelo', 'framework', 'marco conceptual']],
  ['case_study', ['case', 'caso', 'example', 'ejemplo', 'estudio de caso']],
  ['technique', ['technique', 'técnica', 'method', 'método', 'procedure', 'procedimiento', 'process', 'proceso']],
  ['forensic', ['forensic', 'forense', 'evidence', 'evidencia', 'ballistic', 'balística']],
];

export function classifyQueryType(query: string): QueryType {
  const normalized = query.toLowerCase();
  for (const [type, keywords] of QUERY_TYPE_KEYWORDS) {
    if (keywords.some((keyword) => normalized.includes(keyword))) {
      return type;
    }
  }
  return 'general';
}

export function buildUserPrompt(query: string, context: string): string {
  const body = context.length > 0 ? context : NO_CONTEXT_PLACEHOLDER;

  return `Context (relevant documents):

${body}

---

User question: ${query}

Give a complete, well-grounded answer based ONLY on the context above, citing documents by their [Document N] marker. If the context does not hold enough information to answer fully, say so clearly.`;
}

export function buildSpecializedPrompt(
  query: string,
  context: string,
  queryType: QueryType = classifyQueryType(query),
): string {
  return buildUserPrompt(query, context) + SPECIALIZATIONS[queryType];
}
