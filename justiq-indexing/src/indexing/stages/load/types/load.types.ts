/**
 * Load Stage Types
 */

import type { DocumentCategory } from '../../../../common/constants/document-categories';

/**
 * Metadata carried by every document and inherited by its chunks
 */
export interface DocumentMetadata {
  /** File name without extension, unique within its category only */
  docId: string;
  filePath: string;
  type: DocumentCategory;
  typeName: string;
  /** Distinct values of the section column, comma-joined */
  sections?: string;
}

/**
 * One source file normalized into a single text document
 */
export interface DocumentRecord {
  content: string;
  metadata: DocumentMetadata;
}

/**
 * Rows of a CSV file with trimmed header names
 */
export interface CsvTable {
  headers: string[];
  rows: Array<Array<string | undefined>>;
  encoding: CorpusEncoding;
}

export type CorpusEncoding = 'utf-8' | 'cp949';

/**
 * A file that was skipped during a load pass
 */
export interface LoadFailure {
  filePath: string;
  category: DocumentCategory;
  code: string;
  message: string;
}
