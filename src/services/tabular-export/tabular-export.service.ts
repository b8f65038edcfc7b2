import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import {
  BatchResult,
  CANONICAL_FIELD_NAMES,
  CanonicalField,
  InvoiceRecord,
  isInvoiceRecord,
} from '../../models/invoice-record';
import { ExportSheetName, ITabularExportService, TabularRow } from '../../models/service.interfaces';

const EXPORTED_FIELDS: readonly CanonicalField[] = [
  'invoiceNumber',
  'issueDate',
  'sellerId',
  'sellerName',
  'buyerId',
  'buyerName',
  'currency',
  'totalNet',
  'totalTax',
  'totalGross',
  'documentUuid',
];

export const INVOICE_COLUMNS: readonly string[] = [
  'filename',
  'dialect',
  ...EXPORTED_FIELDS.map((field) => CANONICAL_FIELD_NAMES[field]),
  'line_item_count',
  'warnings',
  'error',
];

export const LINE_ITEM_COLUMNS: readonly string[] = [
  'filename',
  'line_number',
  'description',
  'quantity',
  'unit_price',
  'line_total',
];

export const SHEET_TITLES: Record<ExportSheetName, string> = {
  invoices: 'Invoices',
  'line-items': 'Line Items',
};

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/** Base names of downloaded and written exports */
export const EXPORT_FILENAMES: Record<ExportSheetName, string> = {
  invoices: 'invoices_summary',
  'line-items': 'invoice_line_items',
};

/**
 * Flattens a batch result into two tables: one row per input file, and one
 * row per line item of the extracted records. Absent values are blank cells.
 */
@Injectable()
export class TabularExportService implements ITabularExportService {
  invoiceRows(result: BatchResult): TabularRow[] {
    return result.entries.map(({ filename, result: outcome }) => {
      if (!isInvoiceRecord(outcome)) {
        return { filename, error: `${outcome.kind}: ${outcome.detail}` };
      }

      const row: TabularRow = { filename, dialect: outcome.dialect };
      for (const field of EXPORTED_FIELDS) {
        const value = outcome.fields[field];
        if (value !== undefined) {
          row[CANONICAL_FIELD_NAMES[field]] = value;
        }
      }
      row.line_item_count = outcome.lineItems.length;
      row.warnings = outcome.warnings.map((warning) => warning.message).join('; ');
      return row;
    });
  }

  lineItemRows(result: BatchResult): TabularRow[] {
    return result.entries
      .map((entry) => entry.result)
      .filter(isInvoiceRecord)
      .flatMap((record: InvoiceRecord) =>
        record.lineItems.map((item, index) => {
          const row: TabularRow = { filename: record.filename, line_number: index + 1 };
          if (item.description !== undefined) row.description = item.description;
          if (item.quantity !== undefined) row.quantity = item.quantity;
          if (item.unitPrice !== undefined) row.unit_price = item.unitPrice;
          if (item.lineTotal !== undefined) row.line_total = item.lineTotal;
          return row;
        }),
      );
  }

  toCsv(result: BatchResult, sheet: ExportSheetName = 'invoices'): string {
    return XLSX.utils.sheet_to_csv(this.buildSheet(result, sheet));
  }

  toXlsx(result: BatchResult): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, this.buildSheet(result, 'invoices'), SHEET_TITLES.invoices);
    XLSX.utils.book_append_sheet(workbook, this.buildSheet(result, 'line-items'), SHEET_TITLES['line-items']);
    return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
  }

  private buildSheet(result: BatchResult, sheet: ExportSheetName): XLSX.WorkSheet {
    const [columns, rows] =
      sheet === 'invoices'
        ? [INVOICE_COLUMNS, this.invoiceRows(result)]
        : [LINE_ITEM_COLUMNS, this.lineItemRows(result)];

    return XLSX.utils.aoa_to_sheet([[...columns], ...rows.map((row) => columns.map((column) => row[column] ?? ''))]);
  }
}
