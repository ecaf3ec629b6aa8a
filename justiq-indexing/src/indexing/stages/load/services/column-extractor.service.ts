/**
 * Column Extractor Service
 * Turns a parsed CSV table into document content and section metadata.
 *
 * Content comes from the first canonical content column present, otherwise
 * from the rightmost column. Empty cells are dropped.
 */

import { Injectable } from '@nestjs/common';
import {
  CONTENT_COLUMN_NAMES,
  SECTION_COLUMN_NAMES,
} from '../../../../common/constants/corpus-columns';
import type { CsvTable } from '../types/load.types';

export interface ExtractedColumns {
  content: string;
  sections?: string;
  contentColumn: string;
}

@Injectable()
export class ColumnExtractorService {
  extract(table: CsvTable): ExtractedColumns {
    const canonicalContentIndex = this.findColumn(
      table.headers,
      CONTENT_COLUMN_NAMES,
    );
    const contentIndex =
      canonicalContentIndex ?? Math.max(table.headers.length - 1, 0);

    const content = this.columnValues(table, contentIndex).join('\n');

    const sectionIndex = this.findColumn(table.headers, SECTION_COLUMN_NAMES);
    const sections =
      sectionIndex === null
        ? undefined
        : this.distinct(this.columnValues(table, sectionIndex)).join(', ');

    return {
      content,
      sections,
      contentColumn: table.headers[contentIndex] ?? '',
    };
  }

  /**
   * Index of the first header matching a candidate name, by candidate priority
   */
  findColumn(headers: string[], candidates: readonly string[]): number | null {
    for (const candidate of candidates) {
      const index = headers.indexOf(candidate);
      if (index !== -1) {
        return index;
      }
    }
    return null;
  }

  private columnValues(table: CsvTable, index: number): string[] {
    return table.rows
      .map((row) => row[index])
      .filter(
        (value): value is string => value !== undefined && value !== '',
      );
  }

  private distinct(values: string[]): string[] {
    return [...new Set(values)];
  }
}
