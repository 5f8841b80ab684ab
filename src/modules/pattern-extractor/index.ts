export { extract } from './pattern-extractor.js';
export { EXTRACTION_RULES, runRule, parseNumberWithSuffix } from './extraction-rules.js';
export type { RawFields, FieldName, ExtractionRule, AnyExtractionRule, DirectionHit, RuleMatch } from './extraction-rules.js';
