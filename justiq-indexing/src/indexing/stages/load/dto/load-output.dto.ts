/**
 * Load Stage Output DTO
 */

import type { DocumentCategory } from '../../../../common/constants/document-categories';
import type { DocumentRecord, LoadFailure } from '../types/load.types';

export interface LoadOutputDto {
  /**
   * One record per successfully loaded file, category by category
   */
  documents: DocumentRecord[];

  /**
   * Files that were skipped, with the reason
   */
  failures: LoadFailure[];

  /**
   * Categories whose directory does not exist
   */
  missingCategories: DocumentCategory[];

  durationMs: number;
}
