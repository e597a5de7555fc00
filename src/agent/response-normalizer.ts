/**
 * Response Normalizer
 *
 * Agents answer as plain strings, as records with `text`/`output`/...
 * fields, as a nested `data` payload, or as JSON (sometimes fenced,
 * sometimes a single-quoted literal) inside one of those fields.
 * formatOutput() turns any of these into chat-ready prose.
 *
 * Resolution is a first-match-wins chain of extractors. Each returns
 * `undefined` for "not mine"; nothing in the chain throws.
 */

import { isNonEmptyString, isPresent, isRecord } from '../utils/guards.js';

// ============================================================================
// FIELD TABLES
// ============================================================================

/** Fields holding the answer, in priority order */
export const OUTPUT_FIELDS = ['text', 'output', 'message', 'content'] as const;

/** Field holding a nested payload */
export const PAYLOAD_FIELD = 'data';

/** Keys identifying an executive-order record */
const EO_ID_FIELDS = ['eo_number', 'eo_citation', 'executive_order_number', 'executive_order'] as const;

/** Wrapper keys naming an executive order */
const EO_WRAPPER_KEY = /executive[_ ]?order|^eo(?:[_ ]|$)/i;

/** Keys consumed by the executive-order template */
const EO_TEMPLATE_FIELDS = new Set<string>([
  ...EO_ID_FIELDS,
  'title',
  'signing_date',
  'president',
  'publication_date',
  'status',
  'description',
  'summary',
  'last_confirmed',
  'last_confirmed_date',
  'as_of',
  'amended_by',
  'amendments',
  'revoked_by',
  'repealed_by',
  'quote',
]);

/** Recursion bound for nested payloads */
const MAX_DEPTH = 6;

/** Short lists are flattened inline; longer ones are left out */
const MAX_INLINE_LIST = 10;

const FENCED_BLOCK = /^```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```$/;
const EMBEDDED_FENCE = /```(?:json|python|py)?[ \t]*\r?\n([\s\S]*?)\r?\n?```/i;

type Extractor = (value: unknown, depth: number) => string | undefined;

// ============================================================================
// VALUE HELPERS
// ============================================================================

/**
 * Convert response objects exposing `toDict()` or `toJSON()` into
 * plain values.
 */
export function toPlain(value: unknown): unknown {
  if (!isRecord(value) || value instanceof Date) {
    return value;
  }
  for (const method of ['toDict', 'toJSON']) {
    const convert: unknown = Reflect.get(value, method);
    if (typeof convert === 'function') {
      try {
        const converted: unknown = Reflect.apply(convert, value, []);
        return converted;
      } catch {
        return value;
      }
    }
  }
  return value;
}

function scalarText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

function listText(value: unknown): string | undefined {
  if (!Array.isArray(value) || value.length === 0 || value.length > MAX_INLINE_LIST) {
    return undefined;
  }
  const items = value.map(scalarText);
  if (items.some((item) => item === undefined)) {
    return undefined;
  }
  return items.join(', ');
}

function fieldText(value: unknown): string | undefined {
  return scalarText(value) ?? listText(value);
}

function sentence(text: string): string {
  return /[.!?]["')\]]?$/.test(text) ? text : `${text}.`;
}

function labelFor(key: string): string {
  const words = key.replace(/[_-]+/g, ' ').trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Last resort: the raw value as text.
 */
export function stringifyRaw(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (isRecord(value) && Object.keys(value).length === 0) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  try {
    return (JSON.stringify(value) ?? String(value)).trim();
  } catch {
    return String(value).trim();
  }
}

// ============================================================================
// EMBEDDED JSON
// ============================================================================

/**
 * Rewrite a single-quoted literal (True/False/None keywords) as JSON.
 */
export function literalToJson(source: string): string {
  let out = '';
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === '"' || ch === "'") {
      let body = '';
      let j = i + 1;
      while (j < source.length && source.charAt(j) !== ch) {
        const c = source.charAt(j);
        if (c === '\\' && j + 1 < source.length) {
          const next = source.charAt(j + 1);
          body += next === "'" ? "'" : `\\${next}`;
          j += 2;
          continue;
        }
        body += c === '"' ? '\\"' : c;
        j++;
      }
      out += `"${body}"`;
      i = j + 1;
      continue;
    }

    const keyword = /^(True|False|None)\b/.exec(source.slice(i))?.[1];
    if (keyword) {
      out += keyword === 'True' ? 'true' : keyword === 'False' ? 'false' : 'null';
      i += keyword.length;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Parse a string holding a JSON (or single-quoted literal) object or array,
 * optionally fenced. Undefined when the string is prose.
 */
export function parseEmbeddedJson(text: string): unknown {
  let candidate = text.trim();
  const fenced = FENCED_BLOCK.exec(candidate);
  if (fenced) {
    candidate = (fenced[1] ?? '').trim();
  }
  if (!/^[[{]/.test(candidate)) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(candidate);
    return parsed;
  } catch {
    try {
      const parsed: unknown = JSON.parse(literalToJson(candidate));
      return parsed;
    } catch {
      return undefined;
    }
  }
}

// ============================================================================
// RENDERERS
// ============================================================================

/**
 * `## Key themes` section from `summary.themes`.
 */
export function renderThemes(themes: readonly unknown[]): string {
  const lines = ['## Key themes'];

  for (const item of themes) {
    if (!isRecord(item)) {
      const text = scalarText(item);
      if (text) {
        lines.push(`- ${text}`);
      }
      continue;
    }
    const theme = scalarText(item['theme']) ?? scalarText(item['title']) ?? 'Theme';
    const description = scalarText(item['description']);
    const citation = fieldText(item['citation']) ?? fieldText(item['cite']);

    let line = `- **${theme}**`;
    if (description) {
      line += `: ${description}`;
    }
    if (citation) {
      line += ` _(cite: ${citation})_`;
    }
    lines.push(line);
  }

  return lines.join('\n');
}

/**
 * Whether a mapping describes an executive order.
 */
export function isExecutiveOrderRecord(mapping: Record<string, unknown>): boolean {
  return EO_ID_FIELDS.some((field) => scalarText(mapping[field]) !== undefined);
}

/**
 * Sentences describing an executive-order record.
 *
 * @example
 * ```typescript
 * renderExecutiveOrder({ eo_number: 'EO 14067', signing_date: 'March 9, 2022' });
 * // 'EO 14067 was signed on March 9, 2022.'
 * ```
 */
export function renderExecutiveOrder(record: Record<string, unknown>): string {
  const pick = (...keys: string[]): string | undefined => {
    for (const key of keys) {
      const text = fieldText(record[key]);
      if (text) {
        return text;
      }
    }
    return undefined;
  };

  const id = pick(...EO_ID_FIELDS) ?? 'The executive order';
  const title = pick('title');
  const signed = pick('signing_date');
  const president = pick('president');

  const status = pick('status');
  const sentences: string[] = [];

  if (title || signed || president) {
    let lead = title ? `${id}, "${title}",` : id;
    if (signed || president) {
      lead += ' was signed';
      if (signed) lead += ` on ${signed}`;
      if (president) lead += ` by ${president}`;
    }
    sentences.push(sentence(lead.replace(/,$/, '')));
    if (status) sentences.push(sentence(`Its current status is ${status}`));
  } else {
    sentences.push(sentence(status ? `${id} is currently ${status}` : id));
  }

  const published = pick('publication_date');
  if (published) sentences.push(sentence(`It was published on ${published}`));
  const description = pick('description', 'summary');
  if (description) sentences.push(sentence(description));
  const confirmed = pick('last_confirmed', 'last_confirmed_date', 'as_of');
  if (confirmed) sentences.push(sentence(`Status last confirmed on ${confirmed}`));
  const amended = pick('amended_by', 'amendments');
  if (amended) sentences.push(sentence(`It was amended by ${amended}`));
  const revoked = pick('revoked_by', 'repealed_by');
  if (revoked) sentences.push(sentence(`It was revoked by ${revoked}`));
  const quote = pick('quote');
  if (quote) sentences.push(`Quoted text: "${quote}"`);

  const rest = flattenFields(record, EO_TEMPLATE_FIELDS);
  if (rest) sentences.push(rest);

  return sentences.join(' ');
}

/**
 * `Label: value.` sentences for scalar and short-list fields.
 */
export function flattenFields(
  mapping: Record<string, unknown>,
  exclude: ReadonlySet<string> = new Set()
): string | undefined {
  const sentences: string[] = [];
  for (const [key, value] of Object.entries(mapping)) {
    if (exclude.has(key)) {
      continue;
    }
    const text = fieldText(value);
    if (text) {
      sentences.push(sentence(`${labelFor(key)}: ${text}`));
    }
  }
  return sentences.length > 0 ? sentences.join(' ') : undefined;
}

// ============================================================================
// EXTRACTOR CHAIN
// ============================================================================

function render(value: unknown, depth: number): string {
  if (depth > MAX_DEPTH) {
    return stringifyRaw(value);
  }
  for (const extractor of EXTRACTORS) {
    const text = extractor(value, depth);
    if (text !== undefined) {
      return text;
    }
  }
  return stringifyRaw(value);
}

/** Strings: embedded JSON is rendered, prose is stripped */
const fromString: Extractor = (value, depth) => {
  if (typeof value !== 'string') {
    return undefined;
  }
  const parsed = parseEmbeddedJson(value);
  if (parsed !== undefined) {
    const rendered = render(parsed, depth + 1);
    if (rendered) {
      return rendered;
    }
  }

  // Prose followed by a machine-readable copy of the same answer
  const fence = EMBEDDED_FENCE.exec(value);
  if (fence && parseEmbeddedJson(fence[1] ?? '') !== undefined) {
    const prose = value.replace(fence[0], '').trim();
    if (prose) {
      return prose;
    }
  }

  return value.trim();
};

/** `summary.themes` list */
const fromThemes: Extractor = (value) => {
  if (!isRecord(value)) {
    return undefined;
  }
  const summary = value['summary'];
  if (!isRecord(summary)) {
    return undefined;
  }
  const themes = summary['themes'];
  return Array.isArray(themes) && themes.length > 0 ? renderThemes(themes) : undefined;
};

/** `text` / `output` / `message` / `content` */
const fromOutputFields: Extractor = (value, depth) => {
  if (!isRecord(value)) {
    return undefined;
  }
  for (const field of OUTPUT_FIELDS) {
    const candidate = toPlain(value[field]);
    if (isPresent(candidate)) {
      const text = render(candidate, depth + 1);
      if (text) {
        return text;
      }
    }
  }
  return undefined;
};

/** Nested `data` payload */
const fromPayload: Extractor = (value, depth) => {
  if (!isRecord(value)) {
    return undefined;
  }
  const payload = toPlain(value[PAYLOAD_FIELD]);
  if (!isPresent(payload)) {
    return undefined;
  }
  return render(payload, depth + 1) || undefined;
};

/** A mapping with answer fields that are all empty is an empty answer */
const fromEmptyAnswer: Extractor = (value) => {
  if (!isRecord(value)) {
    return undefined;
  }
  const keys = [...OUTPUT_FIELDS, PAYLOAD_FIELD];
  return keys.some((key) => key in value) ? '' : undefined;
};

/**
 * The value under a one-key mapping, with its key.
 */
function soleEntry(mapping: Record<string, unknown>): [string, unknown] | undefined {
  const entries = Object.entries(mapping);
  return entries.length === 1 ? entries[0] : undefined;
}

/** Executive-order record, bare or wrapped in a one-key mapping */
const fromExecutiveOrder: Extractor = (value) => {
  if (!isRecord(value)) {
    return undefined;
  }
  if (isExecutiveOrderRecord(value)) {
    return renderExecutiveOrder(value);
  }
  const sole = soleEntry(value);
  if (!sole) {
    return undefined;
  }
  const [key, inner] = sole;
  const record = toPlain(inner);
  if (isRecord(record) && (EO_WRAPPER_KEY.test(key) || isExecutiveOrderRecord(record))) {
    return renderExecutiveOrder(record);
  }
  return undefined;
};

/** Any other mapping; a one-key wrapper is flattened from its inner record */
const fromFlatMapping: Extractor = (value) => {
  if (!isRecord(value)) {
    return undefined;
  }
  const flat = flattenFields(value);
  if (flat) {
    return flat;
  }
  const inner = toPlain(soleEntry(value)?.[1]);
  return isRecord(inner) ? flattenFields(inner) : undefined;
};

/** Lists render item by item */
const fromList: Extractor = (value, depth) => {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const parts = value.map((item) => render(toPlain(item), depth + 1)).filter((part) => part);
  return parts.length > 0 ? parts.join('\n') : undefined;
};

const EXTRACTORS: readonly Extractor[] = [
  fromString,
  fromThemes,
  fromOutputFields,
  fromPayload,
  fromEmptyAnswer,
  fromExecutiveOrder,
  fromFlatMapping,
  fromList,
];

/**
 * Normalize an agent response into user-facing text.
 *
 * Never throws. A plain string comes back stripped, so normalizing
 * normalized text is a no-op.
 */
export function formatOutput(response: unknown): string {
  return render(toPlain(response), 0).trim();
}

/**
 * Whether a response carries a non-empty answer field, directly or
 * under its `data` payload.
 */
export function hasValidOutput(response: unknown): boolean {
  const value = toPlain(response);
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  if (!isRecord(value)) {
    return false;
  }

  const nonEmpty = (candidate: unknown): boolean =>
    typeof candidate === 'string' ? isNonEmptyString(candidate) : isPresent(candidate);

  if (OUTPUT_FIELDS.some((field) => nonEmpty(toPlain(value[field])))) {
    return true;
  }

  const payload = toPlain(value[PAYLOAD_FIELD]);
  if (typeof payload === 'string') {
    return isNonEmptyString(payload);
  }
  return isRecord(payload) && OUTPUT_FIELDS.some((field) => nonEmpty(toPlain(payload[field])));
}
