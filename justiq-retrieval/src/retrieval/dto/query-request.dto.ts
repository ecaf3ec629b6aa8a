/**
 * Query Request DTO
 * Body of POST /query
 */

import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import {
  DOCUMENT_CATEGORIES,
  type DocumentCategory,
} from '../../common/constants/document-categories';
import { MAX_N_RESULTS } from '../retrieval.constants';

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  question!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_N_RESULTS)
  nResults?: number;

  @IsOptional()
  @IsIn(DOCUMENT_CATEGORIES)
  filterType?: DocumentCategory;
}
