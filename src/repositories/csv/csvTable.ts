import { promises as fs } from 'fs';
import path from 'path';
import { Readable } from 'stream';
import csv from 'csv-parser';
import { StorageError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('CsvTable');

/**
 * One parsed CSV row keyed by header name, plus its 1-based line number
 */
export interface CsvRow<TColumn extends string> {
  line: number;
  values: Record<TColumn, string>;
}

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

// fs errors can come from another realm (e.g. under Jest), so no instanceof Error
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * CSV Table
 *
 * A header-first CSV file treated as a whole-file snapshot:
 * - readRows() parses every row (csv-parser, strict column count)
 * - writeRows() rewrites the file through a temp file + rename
 * - appendRows() adds rows at the end without touching earlier ones
 *
 * Every fs or parse failure leaves here as a StorageError.
 */
export class CsvTable<TColumn extends string> {
  constructor(
    readonly filePath: string,
    readonly columns: readonly TColumn[]
  ) {}

  get headerLine(): string {
    return this.columns.join(',');
  }

  /**
   * Create the file with its header row if it is missing or empty.
   * An existing non-empty file is never rewritten.
   *
   * @returns true if the file was created (or was empty), false if it already existed
   */
  async initialize(): Promise<boolean> {
    const content = await this.readContent();

    if (content !== null && content.length > 0) {
      this.assertHeader(firstLine(content));
      return false;
    }

    await this.run('Failed to create table', async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, `${this.headerLine}\n`, 'utf8');
    });
    return true;
  }

  async readRows(): Promise<CsvRow<TColumn>[]> {
    const content = await this.readContent();

    if (content === null) {
      throw new StorageError(this.filePath, 'Table file does not exist');
    }

    if (content.length === 0) {
      return [];
    }

    return new Promise((resolve, reject) => {
      const rows: CsvRow<TColumn>[] = [];
      let failed = false;

      const fail = (error: StorageError): void => {
        if (!failed) {
          failed = true;
          reject(error);
        }
      };

      Readable.from([stripBom(content)])
        .pipe(csv({ strict: true }))
        .on('headers', (headers: string[]) => {
          if (headers.join(',') !== this.headerLine) {
            fail(this.headerMismatch(headers.join(',')));
          }
        })
        .on('data', (values: Record<TColumn, string>) => {
          // header is line 1
          rows.push({ line: rows.length + 2, values });
        })
        .on('end', () => {
          if (!failed) {
            resolve(rows);
          }
        })
        .on('error', (error: Error) => {
          fail(
            new StorageError(
              this.filePath,
              `Malformed row at line ${rows.length + 2}: ${error.message}`,
              error
            )
          );
        });
    });
  }

  async writeRows(rows: readonly Record<TColumn, string>[]): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    const body = rows.map((row) => this.toLine(row)).join('');

    await this.run('Failed to write table', async () => {
      await fs.writeFile(tempPath, `${this.headerLine}\n${body}`, 'utf8');
      try {
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          logger.warn({ error: cleanupError, tempPath }, 'Failed to remove temp file');
        });
        throw error;
      }
    });
  }

  /**
   * Append rows in a single write. A missing or empty file gets its header first.
   */
  async appendRows(rows: readonly Record<TColumn, string>[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    const content = await this.readContent();
    const header = content === null || content.length === 0 ? `${this.headerLine}\n` : '';
    const body = rows.map((row) => this.toLine(row)).join('');

    await this.run('Failed to append to table', async () => {
      await fs.appendFile(this.filePath, `${header}${body}`, 'utf8');
    });
  }

  private toLine(row: Record<TColumn, string>): string {
    return `${this.columns.map((column) => escapeCsvField(row[column])).join(',')}\n`;
  }

  /**
   * File content, or null if the file does not exist
   */
  private async readContent(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw new StorageError(this.filePath, 'Failed to read table', error);
    }
  }

  private assertHeader(header: string): void {
    if (header !== this.headerLine) {
      throw this.headerMismatch(header);
    }
  }

  private headerMismatch(found: string): StorageError {
    return new StorageError(
      this.filePath,
      `Unexpected header "${found}", expected "${this.headerLine}"`
    );
  }

  private async run(message: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      const reason = isErrnoException(error) && error.code ? `${message}: ${error.code}` : message;
      throw new StorageError(this.filePath, reason, error);
    }
  }
}

function stripBom(content: string): string {
  return content.replace(/^\uFEFF/, '');
}

function firstLine(content: string): string {
  const [line = ''] = stripBom(content).split(/\r?\n/, 1);
  return line;
}
