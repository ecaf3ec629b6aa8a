/**
 * Load Stage Input DTO
 */

export interface LoadInputDto {
  /**
   * Corpus root directory; defaults to DATA_DIR
   */
  dataDir?: string;
}
