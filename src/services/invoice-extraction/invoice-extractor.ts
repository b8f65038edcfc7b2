import { errorMessage } from '../../common/errors/app-error';
import { parseXml, ParsedXml, XmlElement } from '../../common/xml/xml-document';
import { selectElements, selectValues } from '../../common/xml/xml-path';
import { DateFormatUtil } from '../../common/utils/date-format.util';
import { NumberFormatUtil } from '../../common/utils/number-format.util';
import { Dialect, FieldRule } from '../../models/dialect';
import {
  AMOUNT_FIELDS,
  AmountField,
  CANONICAL_FIELD_NAMES,
  CanonicalField,
  DATE_FIELDS,
  ExtractionErrorKind,
  ExtractionOutcome,
  ExtractionWarning,
  InvoiceFields,
  LineItem,
  LineItemField,
  MANDATORY_FIELDS,
  TEXT_FIELDS,
  WarningCode,
} from '../../models/invoice-record';
import { IDialectRegistry } from '../../models/service.interfaces';

export const DEFAULT_TOTAL_TOLERANCE = 0.01;

export interface ExtractorOptions {
  /** Largest accepted |gross - (net + tax)| before a TotalMismatch warning */
  totalTolerance: number;
}

/** Texts selected by the winning rule for a field */
interface SelectedValue {
  readonly texts: readonly string[];
  readonly aggregate: FieldRule['aggregate'];
}

/**
 * Turns the bytes of one XML invoice into an InvoiceRecord or an
 * ExtractionError. Holds no state besides the read-only registry, so the
 * same bytes always produce an equal result.
 */
export class InvoiceExtractor {
  constructor(
    private readonly registry: IDialectRegistry,
    private readonly options: ExtractorOptions = { totalTolerance: DEFAULT_TOTAL_TOLERANCE },
  ) {}

  extract(content: Buffer, filename: string): ExtractionOutcome {
    let parsed: ParsedXml;
    try {
      parsed = parseXml(content);
    } catch (error) {
      return { status: 'failed', filename, kind: ExtractionErrorKind.MALFORMED_XML, detail: errorMessage(error) };
    }

    const { root, encoding } = parsed;
    const dialect = this.registry.resolve(root);
    if (!dialect) {
      return {
        status: 'failed',
        filename,
        kind: ExtractionErrorKind.UNKNOWN_DIALECT,
        detail: `No registered dialect matches root element ${describeRoot(root)}`,
      };
    }

    const warnings = new WarningCollector();
    const fields = extractFields(root, dialect, warnings);
    const lineItems = extractLineItems(root, dialect, warnings);
    checkTotals(fields, this.options.totalTolerance, warnings);

    return {
      status: 'extracted',
      filename,
      dialect: dialect.id,
      encoding,
      fields,
      lineItems,
      warnings: warnings.list(),
    };
  }
}

class WarningCollector {
  private readonly warnings = new Map<string, ExtractionWarning>();

  add(code: WarningCode, message: string, field?: string): void {
    const key = `${code}|${field ?? ''}|${message}`;
    if (!this.warnings.has(key)) {
      this.warnings.set(key, field === undefined ? { code, message } : { code, message, field });
    }
  }

  list(): ExtractionWarning[] {
    return [...this.warnings.values()];
  }
}

function extractFields(root: XmlElement, dialect: Dialect, warnings: WarningCollector): InvoiceFields {
  const fields: InvoiceFields = {};
  const present = new Set<CanonicalField>();

  const select = (field: CanonicalField): SelectedValue | undefined => {
    const selected = selectFirst(root, dialect.fields.get(field) ?? []);
    const fallback = dialect.defaults[field];
    if (selected || fallback === undefined) {
      return selected;
    }
    return { texts: [fallback], aggregate: 'first' };
  };

  for (const field of TEXT_FIELDS) {
    const selected = select(field);
    if (selected) {
      present.add(field);
      fields[field] = selected.texts[0];
    }
  }

  for (const field of DATE_FIELDS) {
    const selected = select(field);
    if (!selected) {
      continue;
    }
    present.add(field);
    const text = selected.texts[0];
    const date = DateFormatUtil.parse(text, dialect.datePatterns);
    if (date === null) {
      const expected = dialect.datePatterns.map((pattern) => pattern.format).join(', ');
      warnings.add(
        WarningCode.UNPARSEABLE_DATE,
        `Cannot parse ${CANONICAL_FIELD_NAMES[field]} value '${text}' as a date (expected ${expected})`,
        CANONICAL_FIELD_NAMES[field],
      );
    } else {
      fields[field] = date;
    }
  }

  for (const field of AMOUNT_FIELDS) {
    const selected = select(field);
    if (!selected) {
      continue;
    }
    present.add(field);
    const amount = parseAmount(field, selected, dialect, warnings);
    if (amount !== null) {
      fields[field] = amount;
    }
  }

  for (const field of MANDATORY_FIELDS) {
    if (!present.has(field)) {
      warnings.add(
        WarningCode.MISSING_MANDATORY_FIELD,
        `Mandatory field ${CANONICAL_FIELD_NAMES[field]} is missing`,
        CANONICAL_FIELD_NAMES[field],
      );
    }
  }

  return fields;
}

function parseAmount(
  field: AmountField,
  selected: SelectedValue,
  dialect: Dialect,
  warnings: WarningCollector,
): number | null {
  const texts = selected.aggregate === 'sum' ? selected.texts : selected.texts.slice(0, 1);
  let total = 0;

  for (const text of texts) {
    const value = NumberFormatUtil.parse(text, dialect.numberFormat);
    if (value === null) {
      warnings.add(
        WarningCode.UNPARSEABLE_NUMBER,
        `Cannot parse ${CANONICAL_FIELD_NAMES[field]} value '${text}' as a number`,
        CANONICAL_FIELD_NAMES[field],
      );
      return null;
    }
    total += value;
  }

  return roundAmount(total);
}

function extractLineItems(root: XmlElement, dialect: Dialect, warnings: WarningCollector): LineItem[] {
  const mapping = dialect.lineItems;
  if (!mapping) {
    return [];
  }

  const items: LineItem[] = [];

  selectElements(root, mapping.path).forEach((line, index) => {
    const position = index + 1;
    const text = (field: LineItemField): string | undefined =>
      selectFirst(line, mapping.fields.get(field) ?? [])?.texts[0];

    const item: LineItem = {};
    const description = text('description');
    if (description !== undefined) {
      item.description = description;
    }

    for (const field of ['quantity', 'unitPrice', 'lineTotal'] as const) {
      const raw = text(field);
      if (raw === undefined) {
        continue;
      }
      const value = NumberFormatUtil.parse(raw, dialect.numberFormat);
      if (value === null) {
        warnings.add(
          WarningCode.LINE_ITEM_SKIPPED,
          `Line item ${position} skipped: cannot parse ${LINE_FIELD_NAMES[field]} value '${raw}'`,
          'line_items',
        );
        return;
      }
      item[field] = value;
    }

    if (Object.keys(item).length === 0) {
      warnings.add(WarningCode.LINE_ITEM_SKIPPED, `Line item ${position} skipped: no line fields found`, 'line_items');
      return;
    }

    items.push(item);
  });

  return items;
}

const LINE_FIELD_NAMES = {
  quantity: 'quantity',
  unitPrice: 'unit_price',
  lineTotal: 'line_total',
} as const;

function checkTotals(fields: InvoiceFields, tolerance: number, warnings: WarningCollector): void {
  const { totalNet, totalTax, totalGross } = fields;
  if (totalNet === undefined || totalTax === undefined || totalGross === undefined) {
    return;
  }

  const expected = roundAmount(totalNet + totalTax);
  const difference = roundAmount(Math.abs(totalGross - expected));
  if (difference > tolerance) {
    warnings.add(
      WarningCode.TOTAL_MISMATCH,
      `total_gross ${totalGross} differs from total_net + total_tax = ${expected} by ${difference}`,
      'total_gross',
    );
  }
}

/** First rule selecting a non-blank value wins; blank selections fall through. */
function selectFirst(context: XmlElement, rules: readonly FieldRule[]): SelectedValue | undefined {
  for (const rule of rules) {
    const texts = selectValues(context, rule.path).map(normalizeText).filter((text) => text.length > 0);
    if (texts.length > 0) {
      return { texts, aggregate: rule.aggregate };
    }
  }
  return undefined;
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// binary floating point noise such as 16 + 3.2 = 19.200000000000003
function roundAmount(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function describeRoot(root: XmlElement): string {
  return root.namespace
    ? `'${root.localName}' in namespace '${root.namespace}'`
    : `'${root.localName}' (no namespace)`;
}
