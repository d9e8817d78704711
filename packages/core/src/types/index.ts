export type { FieldAccess, MappingRecord, QueryRecord } from './record.js';
export type {
  AttributeGetterFn,
  OperatorFn,
  ParsedTerm,
  QueryTerms,
  SortDirection,
  SortSpec,
} from './query.js';
