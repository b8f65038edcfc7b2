import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadDialectTable, readDialectTable } from './dialect-table.loader';
import { AppError, ErrorType } from '../../common/errors/app-error';

const minimalDialect = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  id: 'test-dialect',
  label: 'Test dialect',
  matcher: { kind: 'rootName', rootNames: ['Bill'] },
  namespaces: [],
  numberFormat: { decimalSeparator: '.' },
  dateFormats: ['yyyy-MM-dd'],
  fields: [
    { field: 'invoiceNumber', path: 'Number' },
    { field: 'invoiceNumber', path: '@number' },
  ],
  ...overrides,
});

const captureError = (action: () => unknown): AppError => {
  try {
    action();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an AppError');
};

describe('dialect table loader', () => {
  it('should compile the bundled table', () => {
    const dialects = readDialectTable();

    expect(dialects).toHaveLength(6);
    const cfdi = dialects[0];
    expect(cfdi.id).toBe('cfdi-4.0');
    expect(cfdi.defaults).toEqual({ currency: 'MXN' });
    expect(cfdi.fields.get('totalTax')?.map((rule) => rule.aggregate)).toEqual(['first', 'sum']);
    expect(cfdi.lineItems?.fields.get('lineTotal')).toHaveLength(1);
  });

  it('should keep fallback rules in declaration order', () => {
    const [compiled] = loadDialectTable({ dialects: [minimalDialect()] }, 'inline');

    expect(compiled.fields.get('invoiceNumber')?.map((rule) => rule.path.source)).toEqual(['Number', '@number']);
    expect(compiled.matcher).toEqual({ kind: 'rootName', rootNames: ['Bill'] });
    expect(compiled.lineItems).toBeUndefined();
  });

  it('should reject a table that is not an object', () => {
    const error = captureError(() => loadDialectTable([], 'inline'));

    expect(error.type).toBe(ErrorType.CONFIGURATION_ERROR);
    expect(error.message).toBe("Dialect table 'inline' must be a JSON object");
  });

  it('should report unknown canonical fields with their location', () => {
    const error = captureError(() =>
      loadDialectTable({ dialects: [minimalDialect({ fields: [{ field: 'dueDate', path: 'Due' }] })] }, 'inline'),
    );

    expect(error.message).toBe("Dialect table 'inline' is invalid");
    expect(error.details).toEqual({
      errors: [expect.stringMatching(/^dialects\.0\.fields\.0\.field: field must be one of the following values/)],
    });
  });

  it('should require namespaces for namespace matchers', () => {
    const error = captureError(() =>
      loadDialectTable({ dialects: [minimalDialect({ matcher: { kind: 'namespace' } })] }, 'inline'),
    );

    expect(error.details).toEqual({
      errors: expect.arrayContaining(['dialects.0.matcher.namespaces: namespaces should not be empty']),
    });
  });

  it('should reject paths using unbound prefixes', () => {
    const error = captureError(() =>
      loadDialectTable({ dialects: [minimalDialect({ fields: [{ field: 'invoiceNumber', path: 'cbc:ID' }] })] }, 'inline'),
    );

    expect(error.message).toBe(
      'Dialect \'test-dialect\': Invalid path expression "cbc:ID": namespace prefix \'cbc\' is not bound at position 4',
    );
  });

  it('should reject invalid date formats', () => {
    const error = captureError(() =>
      loadDialectTable({ dialects: [minimalDialect({ dateFormats: ['MM/dd'] })] }, 'inline'),
    );

    expect(error.message).toBe("Dialect 'test-dialect': Date format 'MM/dd' is missing 'yyyy'");
  });

  it('should reject sums over text fields', () => {
    const error = captureError(() =>
      loadDialectTable(
        { dialects: [minimalDialect({ fields: [{ field: 'sellerId', path: 'Seller', aggregate: 'sum' }] })] },
        'inline',
      ),
    );

    expect(error.message).toBe("Dialect 'test-dialect': 'sum' is only allowed for amount fields, not 'sellerId'");
  });

  it('should reject identical separators', () => {
    const error = captureError(() =>
      loadDialectTable(
        { dialects: [minimalDialect({ numberFormat: { decimalSeparator: ',', thousandsSeparator: ',' } })] },
        'inline',
      ),
    );

    expect(error.message).toBe("Dialect 'test-dialect': decimal and thousands separators must differ");
  });

  it('should reject line item paths ending in an attribute', () => {
    const error = captureError(() =>
      loadDialectTable(
        {
          dialects: [
            minimalDialect({ lineItems: { path: 'Lines/@count', fields: [{ field: 'quantity', path: 'Qty' }] } }),
          ],
        },
        'inline',
      ),
    );

    expect(error.message).toBe("Dialect 'test-dialect': line item path 'Lines/@count' must select elements");
  });

  describe('readDialectTable', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'dialects-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should load a table from a file', () => {
      const file = path.join(directory, 'custom.json');
      fs.writeFileSync(file, JSON.stringify({ dialects: [minimalDialect()] }));

      expect(readDialectTable(file).map((dialect) => dialect.id)).toEqual(['test-dialect']);
    });

    it('should report unreadable files as configuration errors', () => {
      const file = path.join(directory, 'broken.json');
      fs.writeFileSync(file, '{ "dialects": ');

      const error = captureError(() => readDialectTable(file));

      expect(error.type).toBe(ErrorType.CONFIGURATION_ERROR);
      expect(error.message).toBe(`Unable to read dialect table '${file}'`);
    });
  });
});
