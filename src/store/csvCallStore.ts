/**
 * CallStore backed by a single CSV file.
 *
 * Every mutation reads the table, applies the change and writes the whole
 * table back through a temp file + rename, inside one mutex. Reads go
 * straight to the file and always see a complete table.
 */
import { readFile } from 'fs/promises';
import { dirname } from 'path';
import type { CallRecord } from '../types/index.js';
import { FileManager } from '../utils/fileManager.js';
import { Mutex } from '../utils/mutex.js';
import { StorageError, ValidationError, errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { CallStore } from './callStore.js';
import { matchesQuery, sortNewestFirst } from './callStore.js';
import { parseTable, rowFilename, serializeTable, type TableRow } from './csvCodec.js';
import { recordViolation } from './schema.js';

const logger = rootLogger.child('store');

export class CsvCallStore implements CallStore {
  private readonly mutex = new Mutex();

  constructor(readonly filePath: string) {}

  async upsert(record: CallRecord): Promise<void> {
    const violation = recordViolation(record);
    if (violation) {
      throw new ValidationError(`Invalid record for ${record.filename || '(no filename)'}`, violation);
    }

    await this.mutex.runExclusive(async () => {
      const rows = await this.readTable();
      const next: TableRow = { kind: 'record', record };
      const index = rows.findIndex((row) => rowFilename(row) === record.filename);
      if (index >= 0) {
        rows[index] = next;
      } else {
        rows.push(next);
      }
      await this.writeTable(rows);
    });
  }

  async get(filename: string): Promise<CallRecord | undefined> {
    const records = await this.readAll();
    return records.find((record) => record.filename === filename);
  }

  async list(): Promise<CallRecord[]> {
    return sortNewestFirst(await this.readAll());
  }

  async delete(filename: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const rows = await this.readTable();
      const remaining = rows.filter((row) => rowFilename(row) !== filename);
      if (remaining.length === rows.length) {
        return false;
      }
      await this.writeTable(remaining);
      return true;
    });
  }

  async search(query: string): Promise<CallRecord[]> {
    const records = await this.list();
    return records.filter((record) => matchesQuery(record, query));
  }

  async ping(): Promise<boolean> {
    try {
      await this.readAll();
      return true;
    } catch (error) {
      logger.warn('Store ping failed:', errorMessage(error));
      return false;
    }
  }

  /**
   * Create the file with just the header row if it doesn't exist yet.
   */
  async initialize(): Promise<void> {
    await FileManager.ensureDir(dirname(this.filePath));
    await this.mutex.runExclusive(async () => {
      if (!(await FileManager.fileExists(this.filePath))) {
        await this.writeTable([]);
        logger.info(`Created store at ${this.filePath}`);
      }
    });
  }

  private async readAll(): Promise<CallRecord[]> {
    const records: CallRecord[] = [];
    for (const row of await this.readTable()) {
      if (row.kind === 'record') {
        records.push(row.record);
      } else {
        logger.warn(`Skipping unreadable row ${row.row}: ${row.reason}`);
      }
    }
    return records;
  }

  /**
   * Every data row in file order; unreadable rows come back as raw cells
   * and are written back unchanged.
   */
  private async readTable(): Promise<TableRow[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new StorageError(`Failed to read ${this.filePath}: ${errorMessage(error)}`);
    }

    try {
      return parseTable(content);
    } catch (error) {
      throw new StorageError(`Failed to parse ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  private async writeTable(rows: TableRow[]): Promise<void> {
    try {
      await FileManager.writeFileAtomic(this.filePath, serializeTable(rows));
    } catch (error) {
      throw new StorageError(`Failed to write ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
