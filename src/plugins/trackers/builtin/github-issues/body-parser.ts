/**
 * ABOUTME: Splits an issue body into description, acceptance criteria and notes.
 */

export interface ParsedIssueBody {
  description: string;
  acceptance: string[];
  notes: string;
}

const ACCEPTANCE_HEADER = /^\s*#{1,6}\s+acceptance\s+criteria\s*$/i;
const DESCRIPTION_HEADER = /^\s*#{1,6}\s+description\s*$/i;
const ANY_HEADER = /^\s*#{1,6}\s+\S/;
const CHECKBOX_ITEM = /^\s*[-*]\s+\[[ xX]\]\s+(.+?)\s*$/;

/**
 * Text before `## Acceptance Criteria` is the description (a leading
 * `## Description` header is dropped). Checkbox lines under the pivot are
 * the acceptance criteria. Everything after the next header is notes.
 * Without the pivot the whole body is the description.
 */
export function parseIssueBody(body: string | null | undefined): ParsedIssueBody {
  const lines = (body ?? '').replace(/\r\n?/g, '\n').split('\n');
  const pivot = lines.findIndex((line) => ACCEPTANCE_HEADER.test(line));

  if (pivot === -1) {
    return { description: stripDescriptionHeader(lines).join('\n').trim(), acceptance: [], notes: '' };
  }

  const description = stripDescriptionHeader(lines.slice(0, pivot)).join('\n').trim();

  const rest = lines.slice(pivot + 1);
  const nextHeader = rest.findIndex((line) => ANY_HEADER.test(line));
  const section = nextHeader === -1 ? rest : rest.slice(0, nextHeader);
  const notes = nextHeader === -1 ? '' : rest.slice(nextHeader + 1).join('\n').trim();

  const acceptance: string[] = [];
  for (const line of section) {
    const match = CHECKBOX_ITEM.exec(line);
    if (match?.[1]) {
      acceptance.push(match[1]);
    }
  }

  return { description, acceptance, notes };
}

function stripDescriptionHeader(lines: string[]): string[] {
  const first = lines.findIndex((line) => line.trim() !== '');
  if (first !== -1 && DESCRIPTION_HEADER.test(lines[first] ?? '')) {
    return lines.slice(first + 1);
  }
  return lines;
}
