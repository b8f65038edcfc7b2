#!/usr/bin/env node

import 'reflect-metadata';
import * as fs from 'fs';
import * as path from 'path';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppError, errorMessage } from '../common/errors/app-error';
import { ConfigurationService } from '../config/configuration.service';
import { InvoiceFile } from '../models/invoice-record';
import { ExportSheetName } from '../models/service.interfaces';
import { InvoiceExtractionService } from '../services/invoice-extraction/invoice-extraction.service';
import { EXPORT_FILENAMES, TabularExportService } from '../services/tabular-export/tabular-export.service';
import { ExtractCliModule } from './extract-cli.module';

export type OutputFormat = 'csv' | 'xlsx';

export interface ExtractCommandOptions {
  inputs: string[];
  out: string;
  format: OutputFormat;
  sheet: ExportSheetName;
  help: boolean;
}

const FORMATS: readonly OutputFormat[] = ['csv', 'xlsx'];
const SHEETS: readonly ExportSheetName[] = ['invoices', 'line-items'];

function isFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

function isSheet(value: string): value is ExportSheetName {
  return SHEETS.some((sheet) => sheet === value);
}

/**
 * Parses `<dir|file...> [--out=<path>] [--format=csv|xlsx] [--sheet=invoices|line-items]`.
 * Options also accept their value as the next argument. Without inputs the
 * current directory is scanned.
 */
export function parseExtractArgs(args: readonly string[]): ExtractCommandOptions {
  const inputs: string[] = [];
  let out: string | undefined;
  let format: OutputFormat = 'csv';
  let sheet: ExportSheetName = 'invoices';
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      inputs.push(arg);
      continue;
    }

    const separator = arg.indexOf('=');
    const name = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (name === 'help') {
      help = true;
      continue;
    }

    let value: string | undefined;
    if (separator !== -1) {
      value = arg.slice(separator + 1);
    } else if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
      value = args[++i];
    }
    if (!value) {
      throw AppError.validationError(`Option --${name} requires a value`);
    }

    switch (name) {
      case 'out':
        out = value;
        break;
      case 'format':
        if (!isFormat(value)) {
          throw AppError.validationError(`Unsupported format '${value}' (expected csv or xlsx)`);
        }
        format = value;
        break;
      case 'sheet':
        if (!isSheet(value)) {
          throw AppError.validationError(`Unsupported sheet '${value}' (expected invoices or line-items)`);
        }
        sheet = value;
        break;
      default:
        throw AppError.validationError(`Unknown option --${name}`);
    }
  }

  return {
    inputs: inputs.length > 0 ? inputs : ['.'],
    out: out ?? `${EXPORT_FILENAMES[format === 'xlsx' ? 'invoices' : sheet]}.${format}`,
    format,
    sheet,
    help,
  };
}

/**
 * Expands the inputs to a list of files: directories contribute their
 * `*.xml` entries sorted by name, files are taken as given.
 */
export function collectInputFiles(inputs: readonly string[]): string[] {
  const files: string[] = [];

  for (const input of inputs) {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(input);
    } catch (error) {
      throw AppError.validationError(`Cannot read input '${input}'`, { reason: errorMessage(error) });
    }

    if (stats.isDirectory()) {
      const entries = fs
        .readdirSync(input, { withFileTypes: true })
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.xml'))
        .map((entry) => entry.name)
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
      files.push(...entries.map((name) => path.join(input, name)));
    } else {
      files.push(input);
    }
  }

  if (files.length === 0) {
    throw AppError.validationError(`No XML files found in ${inputs.join(', ')}`);
  }
  return files;
}

export class ExtractCLI {
  private readonly logger = new Logger(ExtractCLI.name);

  /** Resolves to the process exit code; per-file failures do not fail the command */
  async run(args: readonly string[]): Promise<number> {
    let app: INestApplicationContext | undefined;

    try {
      const options = parseExtractArgs(args);
      if (options.help) {
        this.showHelp();
        return 0;
      }

      const files: InvoiceFile[] = collectInputFiles(options.inputs).map((file) => ({
        filename: file,
        content: this.readInput(file),
      }));

      app = await NestFactory.createApplicationContext(ExtractCliModule, {
        logger: ['error', 'warn', 'log'],
      });
      app.get(ConfigurationService).validateConfiguration();

      const result = await app.get(InvoiceExtractionService).extractBatch(files);
      const exporter = app.get(TabularExportService);
      const output =
        options.format === 'xlsx' ? exporter.toXlsx(result) : exporter.toCsv(result, options.sheet);
      fs.writeFileSync(options.out, output);

      const { total, extracted, failed, warnings } = result.summary;
      this.logger.log(
        `Processed ${total} file(s): ${extracted} extracted, ${failed} failed, ${warnings} warning(s). Results saved to ${options.out}`,
      );
      return 0;
    } catch (error) {
      this.logger.error(`Extraction command failed: ${errorMessage(error)}`);
      return 1;
    } finally {
      await app?.close();
    }
  }

  private readInput(file: string): Buffer {
    try {
      return fs.readFileSync(file);
    } catch (error) {
      throw AppError.validationError(`Cannot read input '${file}'`, { reason: errorMessage(error) });
    }
  }

  private showHelp(): void {
    this.logger.log(
      [
        'Usage: extract-invoices <dir|file...> [options]',
        '',
        'Options:',
        '  --out=<path>                   Output file (default: invoices_summary.csv)',
        '  --format=csv|xlsx              Output format (default: csv)',
        '  --sheet=invoices|line-items    Sheet written to CSV (default: invoices)',
        '  --help                         Show this help',
      ].join('\n'),
    );
  }
}

if (require.main === module) {
  void new ExtractCLI().run(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
