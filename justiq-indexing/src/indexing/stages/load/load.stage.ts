/**
 * Load Stage Orchestrator
 *
 * First stage of the indexing pipeline: Load → Chunk → Persist
 *
 * Responsibilities:
 * - Walk the category directories of the corpus root
 * - Decode and parse each CSV file
 * - Normalize every file into one DocumentRecord
 * - Isolate per-file failures so that one bad file never aborts the pass
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  DOCUMENT_CATEGORIES,
  DOCUMENT_CATEGORY_LABELS,
  type DocumentCategory,
} from '../../../common/constants/document-categories';
import type { LoadInputDto, LoadOutputDto } from './dto';
import type { DocumentRecord, LoadFailure } from './types/load.types';
import { ColumnExtractorService, CsvReaderService } from './services';
import { LoadStageError } from './errors/load-errors';

@Injectable()
export class LoadStage {
  private readonly logger = new Logger(LoadStage.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly csvReader: CsvReaderService,
    private readonly columnExtractor: ColumnExtractorService,
  ) {}

  /**
   * Execute Load Stage
   *
   * @param input - Optional corpus root override
   * @returns Loaded documents plus the files and categories that were skipped
   */
  async execute(input: LoadInputDto = {}): Promise<LoadOutputDto> {
    const startTime = Date.now();
    const dataDir = path.resolve(
      input.dataDir ??
        this.configService.get<string>('DATA_DIR', 'data_sampled'),
    );

    this.logger.log(`=== Load Stage Start === Data directory: ${dataDir}`);

    const documents: DocumentRecord[] = [];
    const failures: LoadFailure[] = [];
    const missingCategories: DocumentCategory[] = [];

    if (!(await this.isDirectory(dataDir))) {
      this.logger.warn(`Data directory ${dataDir} does not exist`);
      return {
        documents,
        failures,
        missingCategories: [...DOCUMENT_CATEGORIES],
        durationMs: Date.now() - startTime,
      };
    }

    for (const category of DOCUMENT_CATEGORIES) {
      const typeName = DOCUMENT_CATEGORY_LABELS[category];
      const categoryDir = path.join(dataDir, category);

      if (!(await this.isDirectory(categoryDir))) {
        this.logger.warn(`Category directory ${categoryDir} does not exist`);
        missingCategories.push(category);
        continue;
      }

      const files = await this.listCsvFiles(categoryDir);
      this.logger.log(`[${typeName}] Loading ${files.length} file(s)...`);

      let loaded = 0;
      for (const filePath of files) {
        try {
          documents.push(await this.loadCsv(filePath, category));
          loaded++;
        } catch (error) {
          const failure = this.toFailure(filePath, category, error);
          this.logger.error(
            `[${typeName}] Skipping ${filePath}: ${failure.message}`,
            error instanceof Error ? error.stack : undefined,
          );
          failures.push(failure);
        }
      }

      this.logger.log(`[${typeName}] Loaded ${loaded}/${files.length} file(s)`);
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `=== Load Stage Complete === ${documents.length} document(s), ` +
        `${failures.length} failure(s), Duration: ${durationMs}ms`,
    );

    return { documents, failures, missingCategories, durationMs };
  }

  /**
   * Load a single CSV file as one document
   * @throws LoadStageError if the file cannot be decoded or parsed
   */
  async loadCsv(
    filePath: string,
    category: DocumentCategory,
  ): Promise<DocumentRecord> {
    const table = await this.csvReader.read(filePath);
    const { content, sections, contentColumn } =
      this.columnExtractor.extract(table);

    this.logger.debug(
      `Parsed ${filePath} (${table.encoding}, ${table.rows.length} rows, content column "${contentColumn}")`,
    );

    return {
      content,
      metadata: {
        docId: path.basename(filePath, path.extname(filePath)),
        filePath,
        type: category,
        typeName: DOCUMENT_CATEGORY_LABELS[category],
        ...(sections !== undefined && { sections }),
      },
    };
  }

  private async listCsvFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter(
        (entry) =>
          entry.isFile() && path.extname(entry.name).toLowerCase() === '.csv',
      )
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(dir, name));
  }

  private async isDirectory(dir: string): Promise<boolean> {
    try {
      return (await fs.stat(dir)).isDirectory();
    } catch (error) {
      if (this.isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }

  private isMissingPathError(error: unknown): boolean {
    // fs errors are not `instanceof Error` under Jest's sandboxed realm
    return (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    );
  }

  private toFailure(
    filePath: string,
    category: DocumentCategory,
    error: unknown,
  ): LoadFailure {
    if (error instanceof LoadStageError) {
      return { filePath, category, code: error.code, message: error.message };
    }
    return {
      filePath,
      category,
      code: 'LOAD_UNKNOWN',
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
