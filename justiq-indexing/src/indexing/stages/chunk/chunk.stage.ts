import { Injectable, Logger } from '@nestjs/common';
import type { ChunkInputDto, ChunkOutputDto } from './dto';
import type { ChunkRecord } from './types';
import type { DocumentRecord } from '../load/types/load.types';
import {
  ChunkIdGeneratorService,
  SentenceWindowSplitterService,
} from './services';

/**
 * Chunk Stage - Main Orchestrator
 * Splits loaded documents into overlapping, sentence-aligned chunks that
 * inherit the document metadata.
 */
@Injectable()
export class ChunkStage {
  private readonly logger = new Logger(ChunkStage.name);

  constructor(
    private readonly splitter: SentenceWindowSplitterService,
    private readonly idGenerator: ChunkIdGeneratorService,
  ) {}

  /**
   * Execute chunk stage over every document
   * @throws InvalidChunkOptionsError before any document is split
   */
  execute(input: ChunkInputDto): ChunkOutputDto {
    const startTime = Date.now();
    const { documents, chunkSize, overlap } = input;

    this.splitter.validateOptions({ chunkSize, overlap });
    this.logger.log(
      `Chunking ${documents.length} document(s) (chunkSize=${chunkSize}, overlap=${overlap})...`,
    );

    const chunks: ChunkRecord[] = [];
    const emptyDocuments: string[] = [];

    for (const doc of documents) {
      const docChunks = this.chunkDocument(doc, chunkSize, overlap);
      if (docChunks.length === 0) {
        emptyDocuments.push(
          this.idGenerator.generateDocumentKey(
            doc.metadata.type,
            doc.metadata.docId,
          ),
        );
      }
      chunks.push(...docChunks);
    }

    if (emptyDocuments.length > 0) {
      this.logger.warn(
        `${emptyDocuments.length} document(s) produced no chunks: ${emptyDocuments.join(', ')}`,
      );
    }

    const processingTime = Date.now() - startTime;
    const totalLength = chunks.reduce(
      (sum, chunk) => sum + chunk.content.length,
      0,
    );

    this.logger.log(
      `Chunk stage completed in ${processingTime}ms - ${chunks.length} chunk(s)`,
    );

    return {
      chunks,
      chunkMetadata: {
        documentCount: documents.length,
        chunkCount: chunks.length,
        emptyDocuments,
        averageChunkLength: chunks.length > 0 ? totalLength / chunks.length : 0,
        processingTime,
      },
    };
  }

  /**
   * Split one document into chunks
   * @param doc - Document from the Load Stage
   * @param chunkSize - Window size in characters
   * @param overlap - Characters shared by consecutive windows
   */
  chunkDocument(
    doc: DocumentRecord,
    chunkSize = 1000,
    overlap = 200,
  ): ChunkRecord[] {
    const windows = this.splitter.split(doc.content, { chunkSize, overlap });

    return windows.map((window, chunkIdx) => ({
      content: window.text,
      metadata: {
        ...doc.metadata,
        chunkIdx,
        chunkId: this.idGenerator.generateChunkId(doc.metadata.docId, chunkIdx),
      },
    }));
  }
}
