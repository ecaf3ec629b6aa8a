/**
 * CSV Reader Service
 * Reads a corpus file, decodes it (UTF-8, then one CP949 fallback) and
 * parses it into header + rows.
 */

import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import * as iconv from 'iconv-lite';
import * as fs from 'fs/promises';
import { TextDecoder } from 'util';
import type { CorpusEncoding, CsvTable } from '../types/load.types';
import {
  EmptyFileError,
  EncodingError,
  FileReadError,
  MalformedCsvError,
} from '../errors/load-errors';

const FALLBACK_ENCODING = 'cp949';
const REPLACEMENT_CHARACTER = '\uFFFD';

@Injectable()
export class CsvReaderService {
  private readonly logger = new Logger(CsvReaderService.name);
  private readonly utf8Decoder = new TextDecoder('utf-8', { fatal: true });

  /**
   * Read and parse one CSV file
   * @throws LoadStageError subclasses; callers isolate them per file
   */
  async read(filePath: string): Promise<CsvTable> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      throw new FileReadError(
        filePath,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    const { text, encoding } = this.decode(buffer, filePath);
    return this.parse(text, encoding, filePath);
  }

  /**
   * Decode with UTF-8; on failure retry exactly once with CP949
   */
  decode(
    buffer: Buffer,
    filePath: string,
  ): { text: string; encoding: CorpusEncoding } {
    try {
      return { text: this.utf8Decoder.decode(buffer), encoding: 'utf-8' };
    } catch (error) {
      this.logger.warn(
        `UTF-8 decoding failed for ${filePath} (${error instanceof Error ? error.message : String(error)}), retrying with ${FALLBACK_ENCODING}`,
      );
    }

    // iconv substitutes U+FFFD for byte sequences CP949 does not map
    const text = iconv.decode(buffer, FALLBACK_ENCODING);
    const invalidAt = text.indexOf(REPLACEMENT_CHARACTER);
    if (invalidAt !== -1) {
      this.logger.error(
        `${FALLBACK_ENCODING} decoding failed for ${filePath} at character ${invalidAt}`,
      );
      throw new EncodingError(filePath, ['utf-8', FALLBACK_ENCODING]);
    }

    return { text, encoding: FALLBACK_ENCODING };
  }

  /**
   * Parse decoded text. The first non-empty line is the header.
   * Rows may be shorter than the header (missing cells) but not longer.
   */
  parse(text: string, encoding: CorpusEncoding, filePath: string): CsvTable {
    let records: unknown;
    try {
      records = parse(text, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
    } catch (error) {
      throw new MalformedCsvError(
        filePath,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    const rows = this.toRows(records, filePath);
    if (rows.length === 0) {
      throw new EmptyFileError(filePath);
    }

    const headers = rows[0].map((header) => header.trim());
    const dataRows = rows.slice(1);

    dataRows.forEach((row, index) => {
      if (row.length > headers.length) {
        throw new MalformedCsvError(
          filePath,
          `expected ${headers.length} fields in record ${index + 1}, saw ${row.length}`,
        );
      }
    });

    return { headers, rows: dataRows, encoding };
  }

  private toRows(records: unknown, filePath: string): string[][] {
    if (!Array.isArray(records)) {
      throw new MalformedCsvError(filePath, 'parser returned no records');
    }

    return records.map((record: unknown, index) => {
      if (
        !Array.isArray(record) ||
        !record.every((cell): cell is string => typeof cell === 'string')
      ) {
        throw new MalformedCsvError(
          filePath,
          `record ${index} is not a list of fields`,
        );
      }
      return record;
    });
  }
}
