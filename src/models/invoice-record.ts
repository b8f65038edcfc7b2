/**
 * Canonical output model of the extraction engine.
 *
 * Every field of an extracted invoice is optional: a value is present only
 * when the dialect mapping resolved it and it survived normalization.
 */

export const TEXT_FIELDS = [
  'invoiceNumber',
  'sellerId',
  'sellerName',
  'buyerId',
  'buyerName',
  'currency',
  'documentUuid',
] as const;

export const DATE_FIELDS = ['issueDate'] as const;

export const AMOUNT_FIELDS = ['totalNet', 'totalTax', 'totalGross'] as const;

export type TextField = (typeof TEXT_FIELDS)[number];
export type DateField = (typeof DATE_FIELDS)[number];
export type AmountField = (typeof AMOUNT_FIELDS)[number];
export type CanonicalField = TextField | DateField | AmountField;

export const CANONICAL_FIELDS: readonly CanonicalField[] = [
  ...TEXT_FIELDS,
  ...DATE_FIELDS,
  ...AMOUNT_FIELDS,
];

export const MANDATORY_FIELDS: readonly CanonicalField[] = ['invoiceNumber', 'issueDate'];

/** snake_case names used in exported columns and warning messages */
export const CANONICAL_FIELD_NAMES: Record<CanonicalField, string> = {
  invoiceNumber: 'invoice_number',
  issueDate: 'issue_date',
  sellerId: 'seller_id',
  sellerName: 'seller_name',
  buyerId: 'buyer_id',
  buyerName: 'buyer_name',
  currency: 'currency',
  documentUuid: 'document_uuid',
  totalNet: 'total_net',
  totalTax: 'total_tax',
  totalGross: 'total_gross',
};

export type InvoiceFields = Partial<Record<TextField | DateField, string> & Record<AmountField, number>>;

export const LINE_ITEM_FIELDS = ['description', 'quantity', 'unitPrice', 'lineTotal'] as const;
export type LineItemField = (typeof LINE_ITEM_FIELDS)[number];

export interface LineItem {
  description?: string;
  quantity?: number;
  unitPrice?: number;
  lineTotal?: number;
}

export enum WarningCode {
  MISSING_MANDATORY_FIELD = 'MissingMandatoryField',
  UNPARSEABLE_NUMBER = 'UnparseableNumber',
  UNPARSEABLE_DATE = 'UnparseableDate',
  LINE_ITEM_SKIPPED = 'LineItemSkipped',
  TOTAL_MISMATCH = 'TotalMismatch',
}

export interface ExtractionWarning {
  readonly code: WarningCode;
  readonly message: string;
  readonly field?: string;
}

export enum ExtractionErrorKind {
  MALFORMED_XML = 'MalformedXML',
  UNKNOWN_DIALECT = 'UnknownDialect',
  PROCESSING_FAILED = 'ProcessingFailed',
}

export interface InvoiceRecord {
  readonly status: 'extracted';
  readonly filename: string;
  readonly dialect: string;
  readonly encoding: string;
  readonly fields: InvoiceFields;
  readonly lineItems: readonly LineItem[];
  readonly warnings: readonly ExtractionWarning[];
}

export interface ExtractionError {
  readonly status: 'failed';
  readonly filename: string;
  readonly kind: ExtractionErrorKind;
  readonly detail: string;
}

export type ExtractionOutcome = InvoiceRecord | ExtractionError;

export interface InvoiceFile {
  readonly content: Buffer;
  readonly filename: string;
}

export interface BatchEntry {
  readonly index: number;
  readonly filename: string;
  readonly result: ExtractionOutcome;
}

export interface BatchSummary {
  readonly total: number;
  readonly extracted: number;
  readonly failed: number;
  readonly warnings: number;
}

export interface BatchResult {
  readonly entries: readonly BatchEntry[];
  readonly summary: BatchSummary;
}

export function isInvoiceRecord(outcome: ExtractionOutcome): outcome is InvoiceRecord {
  return outcome.status === 'extracted';
}

export function isExtractionError(outcome: ExtractionOutcome): outcome is ExtractionError {
  return outcome.status === 'failed';
}
