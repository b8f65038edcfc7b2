import { CompiledPath } from '../common/xml/xml-path';
import { DatePattern } from '../common/utils/date-format.util';
import { NumberFormat } from '../common/utils/number-format.util';
import { CanonicalField, LineItemField } from './invoice-record';

/**
 * How a document root is recognised as belonging to a dialect.
 * Namespace matchers may additionally pin the root element's local name.
 */
export type DialectMatcher =
  | {
      readonly kind: 'namespace';
      readonly namespaces: readonly string[];
      readonly rootNames?: readonly string[];
    }
  | {
      readonly kind: 'rootName';
      readonly rootNames: readonly string[];
    };

export type FieldAggregate = 'first' | 'sum';

/**
 * One candidate location for a field. Rules for the same field are tried
 * in declaration order; `sum` adds every selected numeric value.
 */
export interface FieldRule {
  readonly path: CompiledPath;
  readonly aggregate: FieldAggregate;
}

export interface LineItemMapping {
  /** Selects one element per line, relative to the document root */
  readonly path: CompiledPath;
  /** Paths relative to each line element */
  readonly fields: ReadonlyMap<LineItemField, readonly FieldRule[]>;
}

export interface Dialect {
  readonly id: string;
  readonly label: string;
  readonly matcher: DialectMatcher;
  readonly numberFormat: NumberFormat;
  readonly datePatterns: readonly DatePattern[];
  /** Values used when no rule for the field yields a value */
  readonly defaults: Readonly<Partial<Record<CanonicalField, string>>>;
  readonly fields: ReadonlyMap<CanonicalField, readonly FieldRule[]>;
  readonly lineItems?: LineItemMapping;
}

export interface DialectSummary {
  readonly id: string;
  readonly label: string;
}
