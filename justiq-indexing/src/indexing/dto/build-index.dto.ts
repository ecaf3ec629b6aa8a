import type { LoadFailure } from '../stages/load/types/load.types';
import type { DocumentCategory } from '../../common/constants/document-categories';

export interface BuildIndexOptions {
  chunkSize?: number;
  overlap?: number;
  dataDir?: string;
}

export interface BuildIndexResultDto {
  documentCount: number;
  chunkCount: number;
  vectorsUpserted: number;
  failures: LoadFailure[];
  missingCategories: DocumentCategory[];
  durationMs: number;
}
