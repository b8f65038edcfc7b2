import * as fs from 'fs';
import * as path from 'path';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { AppError, errorMessage } from '../../common/errors/app-error';
import { compilePath, CompiledPath, PathSyntaxError } from '../../common/xml/xml-path';
import { DateFormatUtil, DatePattern } from '../../common/utils/date-format.util';
import { AMOUNT_FIELDS, AmountField, CanonicalField, LineItemField } from '../../models/invoice-record';
import { Dialect, DialectMatcher, FieldRule, LineItemMapping } from '../../models/dialect';
import { DialectDto, DialectTableDto } from './dialect-table.dto';
import bundledTable from './dialects.json';

export const BUNDLED_TABLE_SOURCE = 'bundled dialects.json';

/**
 * Reads the dialect table from `filePath`, or the bundled table when no
 * path is given, and compiles it.
 */
export function readDialectTable(filePath?: string): Dialect[] {
  if (!filePath) {
    return loadDialectTable(bundledTable, BUNDLED_TABLE_SOURCE);
  }

  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw AppError.configurationError(`Unable to read dialect table '${resolved}'`, {
      reason: errorMessage(error),
    });
  }

  return loadDialectTable(raw, resolved);
}

/** Validates a parsed dialect table and compiles its paths and date formats. */
export function loadDialectTable(raw: unknown, source: string): Dialect[] {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw AppError.configurationError(`Dialect table '${source}' must be a JSON object`);
  }

  const table = plainToInstance(DialectTableDto, raw);
  const errors = validateSync(table, { forbidUnknownValues: true });
  if (errors.length > 0) {
    throw AppError.configurationError(`Dialect table '${source}' is invalid`, {
      errors: describeValidationErrors(errors),
    });
  }

  return table.dialects.map(compileDialect);
}

function compileDialect(dto: DialectDto): Dialect {
  const fail = (message: string, details?: unknown): AppError =>
    AppError.configurationError(`Dialect '${dto.id}': ${message}`, details);

  const bindings: Record<string, string[]> = {};
  for (const binding of dto.namespaces) {
    if (bindings[binding.prefix]) {
      throw fail(`namespace prefix '${binding.prefix}' is bound twice`);
    }
    bindings[binding.prefix] = binding.uris;
  }

  const { decimalSeparator, thousandsSeparator } = dto.numberFormat;
  if (decimalSeparator === thousandsSeparator) {
    throw fail('decimal and thousands separators must differ');
  }

  const compile = (source: string): CompiledPath => {
    try {
      return compilePath(source, bindings);
    } catch (error) {
      if (error instanceof PathSyntaxError) {
        throw fail(error.message);
      }
      throw error;
    }
  };

  const datePatterns: DatePattern[] = dto.dateFormats.map((format) => {
    try {
      return DateFormatUtil.compile(format);
    } catch (error) {
      throw fail(errorMessage(error));
    }
  });

  const fields = new Map<CanonicalField, FieldRule[]>();
  for (const rule of dto.fields) {
    const aggregate = rule.aggregate ?? 'first';
    if (aggregate === 'sum' && !isAmountField(rule.field)) {
      throw fail(`'sum' is only allowed for amount fields, not '${rule.field}'`);
    }
    const rules = fields.get(rule.field) ?? [];
    rules.push({ path: compile(rule.path), aggregate });
    fields.set(rule.field, rules);
  }

  const defaults: Partial<Record<CanonicalField, string>> = {};
  for (const entry of dto.defaults ?? []) {
    defaults[entry.field] = entry.value;
  }

  let lineItems: LineItemMapping | undefined;
  if (dto.lineItems) {
    const linePath = compile(dto.lineItems.path);
    if (!linePath.selectsElements) {
      throw fail(`line item path '${dto.lineItems.path}' must select elements`);
    }
    const lineFields = new Map<LineItemField, FieldRule[]>();
    for (const rule of dto.lineItems.fields) {
      const rules = lineFields.get(rule.field) ?? [];
      rules.push({ path: compile(rule.path), aggregate: 'first' });
      lineFields.set(rule.field, rules);
    }
    lineItems = { path: linePath, fields: lineFields };
  }

  return {
    id: dto.id,
    label: dto.label,
    matcher: toMatcher(dto),
    numberFormat: { decimalSeparator, thousandsSeparator },
    datePatterns,
    defaults,
    fields,
    lineItems,
  };
}

function toMatcher(dto: DialectDto): DialectMatcher {
  const { kind, namespaces, rootNames } = dto.matcher;
  if (kind === 'namespace') {
    return { kind, namespaces: namespaces ?? [], rootNames };
  }
  return { kind, rootNames: rootNames ?? [] };
}

function isAmountField(field: CanonicalField): field is AmountField {
  return AMOUNT_FIELDS.some((amountField) => amountField === field);
}

function describeValidationErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
    return [...own, ...describeValidationErrors(error.children ?? [], property)];
  });
}
