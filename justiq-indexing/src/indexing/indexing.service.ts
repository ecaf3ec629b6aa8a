import { Injectable, Logger } from '@nestjs/common';
import { LoadStage } from './stages/load/load.stage';
import { ChunkStage } from './stages/chunk/chunk.stage';
import { PersistStage } from './stages/persist/persist.stage';
import type { DocumentRecord } from './stages/load/types/load.types';
import type { ChunkRecord } from './stages/chunk/types';
import type { BuildIndexOptions, BuildIndexResultDto } from './dto/build-index.dto';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Indexing pipeline entry points: Load → Chunk → Persist
 */
@Injectable()
export class IndexingService {
  private readonly logger = new Logger(IndexingService.name);

  constructor(
    private readonly loadStage: LoadStage,
    private readonly chunkStage: ChunkStage,
    private readonly persistStage: PersistStage,
  ) {}

  /**
   * Load every document of the corpus. Missing categories and unreadable
   * files are logged and skipped.
   */
  async loadAll(dataDir?: string): Promise<DocumentRecord[]> {
    const { documents } = await this.loadStage.execute({ dataDir });
    return documents;
  }

  async loadAndChunk(
    chunkSize = DEFAULT_CHUNK_SIZE,
    overlap = DEFAULT_CHUNK_OVERLAP,
    dataDir?: string,
  ): Promise<ChunkRecord[]> {
    const documents = await this.loadAll(dataDir);
    const { chunks } = this.chunkStage.execute({
      documents,
      chunkSize,
      overlap,
    });
    return chunks;
  }

  /**
   * Full index run: load and chunk the corpus, then upsert every chunk
   */
  async buildIndex(options: BuildIndexOptions = {}): Promise<BuildIndexResultDto> {
    const startTime = Date.now();
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

    const loadOutput = await this.loadStage.execute({
      dataDir: options.dataDir,
    });
    const chunkOutput = this.chunkStage.execute({
      documents: loadOutput.documents,
      chunkSize,
      overlap,
    });
    const persistOutput = await this.persistStage.execute({
      chunks: chunkOutput.chunks,
    });

    const result: BuildIndexResultDto = {
      documentCount: loadOutput.documents.length,
      chunkCount: chunkOutput.chunks.length,
      vectorsUpserted: persistOutput.vectorsUpserted,
      failures: loadOutput.failures,
      missingCategories: loadOutput.missingCategories,
      durationMs: Date.now() - startTime,
    };

    this.logger.log(
      `Index build complete: ${result.documentCount} document(s), ` +
        `${result.chunkCount} chunk(s), ${result.failures.length} skipped file(s) in ${result.durationMs}ms`,
    );

    return result;
  }
}
