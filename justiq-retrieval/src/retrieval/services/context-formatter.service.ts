import { Injectable } from '@nestjs/common';
import type { SearchResult } from '../types';
import type { SourceAttributionDto } from '../dto/query-result.dto';

const CONTEXT_SEPARATOR = '\n---\n';
const DEFAULT_TYPE_NAME = 'document';
const DEFAULT_DOC_ID = 'unknown';

/**
 * Context Formatter Service
 * Renders ranked search results into the prompt context and the source list.
 * Ranking order is kept; chunks of the same document are not merged.
 */
@Injectable()
export class ContextFormatterService {
  formatContext(results: SearchResult[]): string {
    return results
      .map(
        (result, index) =>
          `[document ${index + 1}] (${this.typeName(result)}) - ${this.docId(result)}\n${result.content}\n`,
      )
      .join(CONTEXT_SEPARATOR);
  }

  toSources(results: SearchResult[]): SourceAttributionDto[] {
    return results.map((result) => ({
      docId: this.docId(result),
      type: this.typeName(result),
      distance: result.distance,
    }));
  }

  private typeName(result: SearchResult): string {
    return this.stringField(result, 'typeName') ?? DEFAULT_TYPE_NAME;
  }

  private docId(result: SearchResult): string {
    return this.stringField(result, 'docId') ?? DEFAULT_DOC_ID;
  }

  private stringField(result: SearchResult, key: string): string | undefined {
    const value = result.metadata[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }
}
