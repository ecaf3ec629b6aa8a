export interface PersistOutputDto {
  vectorsUpserted: number;
  documentsReplaced: number;
  durationMs: number;
}
