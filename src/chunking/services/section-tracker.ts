/**
 * Section Tracker
 * Detects heading lines (markdown, ALL CAPS, numbered) and resolves which
 * section a text offset belongs to.
 */

import type { SectionHeading } from '../types/chunk.types';

const MARKDOWN_HEADING_REGEX = /^#{1,6}\s+(.+)$/;
const NUMBERED_HEADING_REGEX = /^(?:\d+(?:\.\d+)*\.?|[IVXLC]+\.)\s+\p{Lu}/u;
const MIN_HEADING_LENGTH = 3;
const MAX_HEADING_LENGTH = 100;

export function detectHeadings(text: string): SectionHeading[] {
  const headings: SectionHeading[] = [];
  let offset = 0;

  for (const line of text.split('\n')) {
    const title = headingTitle(line.trim());
    if (title) {
      headings.push({ offset: offset + line.indexOf(line.trim()), title });
    }
    offset += line.length + 1;
  }

  return headings;
}

function headingTitle(line: string): string | null {
  if (line.length < MIN_HEADING_LENGTH || line.length > MAX_HEADING_LENGTH) {
    return null;
  }

  const markdown = MARKDOWN_HEADING_REGEX.exec(line);
  if (markdown) {
    return markdown[1].trim();
  }

  // ALL CAPS line with at least one letter, e.g. "CHAPTER 2: VICTIMOLOGY"
  if (/\p{L}/u.test(line) && !/\p{Ll}/u.test(line) && !/[.,;]$/.test(line)) {
    return line;
  }

  if (NUMBERED_HEADING_REGEX.test(line) && !/[.;,:]$/.test(line)) {
    return line;
  }

  return null;
}

export class SectionTracker {
  private readonly headings: SectionHeading[];

  constructor(
    text: string,
    private readonly documentId: string,
  ) {
    this.headings = detectHeadings(text);
  }

  /**
   * Section containing the offset: the last heading at or before it
   */
  resolve(offset: number): { sectionId: string; sectionTitle?: string } {
    let index = -1;
    for (let i = 0; i < this.headings.length; i++) {
      if (this.headings[i].offset > offset) {
        break;
      }
      index = i;
    }

    if (index === -1) {
      return { sectionId: `${this.documentId}:sec-0` };
    }

    return {
      sectionId: `${this.documentId}:sec-${index + 1}`,
      sectionTitle: this.headings[index].title,
    };
  }
}
