import { EmptyMessageError } from '../../services/errors.js';
import { EXTRACTION_RULES, runRule } from './extraction-rules.js';
import type { ExtractionRule, FieldName, RawFields } from './extraction-rules.js';

interface Span {
  start: number;
  end: number;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

function applyRule<K extends FieldName>(
  rule: ExtractionRule<K>,
  text: string,
  claimed: Span[],
  fields: RawFields,
): void {
  const matches = runRule(rule, text).filter(
    (match) => !claimed.some((span) => overlaps(span, match)),
  );

  for (const match of matches) {
    claimed.push({ start: match.start, end: match.end });
  }

  const first = matches[0];
  if (first && fields[rule.field] === undefined) {
    fields[rule.field] = first.value;
  }
}

export function extract(
  rawText: string | null | undefined,
  rules: readonly ExtractionRule<FieldName>[] = EXTRACTION_RULES,
): RawFields {
  if (rawText === null || rawText === undefined || rawText.trim().length === 0) {
    throw new EmptyMessageError();
  }

  const fields: RawFields = {};
  const claimed: Span[] = [];

  for (const rule of rules) {
    applyRule(rule, rawText, claimed, fields);
  }

  return fields;
}
