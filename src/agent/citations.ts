/**
 * Sources Section
 *
 * Answers end with a Markdown `**Sources**` list. These helpers attach,
 * detach and filter that list.
 *
 * @example
 * ```typescript
 * const { body, sources } = splitSources('Answer.\n**Sources**\nhttp://a');
 * // body: 'Answer.', sources: ['http://a']
 * appendSources(body, sources);
 * // 'Answer.\n\n**Sources**\n- http://a'
 * ```
 */

import type { SourcePolicy } from '../search/types.js';
import { dedupe } from './context-builder.js';

/** Heading line of the sources section */
export const SOURCES_HEADING = '**Sources**';

const HEADING_LINE = /^\s*\*\*Sources\*\*:?\s*$/;
const BULLET = /^(?:[-*•]|\d+[.)])\s+/;

/**
 * Answer prose and the sources listed after it.
 */
export interface SplitAnswer {
  body: string;
  sources: string[];
}

/**
 * Detach the last `**Sources**` section from an answer.
 *
 * Text without a sources heading comes back trimmed, with no sources.
 */
export function splitSources(text: string): SplitAnswer {
  const lines = text.split('\n');

  let heading = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (HEADING_LINE.test(lines[i] ?? '')) {
      heading = i;
      break;
    }
  }
  if (heading === -1) {
    return { body: text.trim(), sources: [] };
  }

  const sources = lines
    .slice(heading + 1)
    .map((line) => line.trim().replace(BULLET, '').trim())
    .filter((line) => line.length > 0);

  return {
    body: lines.slice(0, heading).join('\n').trim(),
    sources,
  };
}

/**
 * Append a bulleted sources section. Nothing is appended for an empty list.
 */
export function appendSources(body: string, sources: readonly string[]): string {
  if (sources.length === 0) {
    return body;
  }
  const bullets = sources.map((source) => `- ${source}`).join('\n');
  return `${body}\n\n${SOURCES_HEADING}\n${bullets}`;
}

/**
 * De-duplicated sources the policy allows users to see, first-seen order.
 */
export function publicSources(sources: readonly string[], policy: SourcePolicy): string[] {
  return dedupe(sources.map((source) => source.trim())).filter((source) =>
    policy.isPublicSource(source)
  );
}
