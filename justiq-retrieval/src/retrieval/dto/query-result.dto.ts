/**
 * Query Result DTO
 */

export interface SourceAttributionDto {
  docId: string;
  /** Human-readable category label, e.g. `Statute` */
  type: string;
  distance: number;
}

export interface QueryResultDto {
  answer: string;
  /** One entry per retrieved chunk, in ranking order */
  sources: SourceAttributionDto[];
  question: string;
}
