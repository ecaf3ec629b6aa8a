import { Injectable } from '@nestjs/common';
import type { ChunkOptions, TextWindow } from '../types';
import { InvalidChunkOptionsError } from '../errors';

/**
 * Sentence Window Splitter Service
 * Sliding character window with soft sentence alignment.
 *
 * A window that does not reach the end of the text is cut right after the
 * last period it contains, provided that period lies past
 * the window midpoint and the cut still lets the next window advance.
 * Question and exclamation marks do not move a boundary.
 * Otherwise the window keeps its full size, even if that ends mid-word.
 * Consecutive windows share `overlap` characters.
 */
@Injectable()
export class SentenceWindowSplitterService {
  private readonly SENTENCE_TERMINATOR = '.';

  split(content: string, options: ChunkOptions): TextWindow[] {
    this.validateOptions(options);

    const { chunkSize, overlap } = options;
    const windows: TextWindow[] = [];
    let start = 0;

    while (start < content.length) {
      let end = start + chunkSize;

      if (end < content.length) {
        end = this.alignToSentence(content, start, end, options);
      }

      const text = content.slice(start, end).trim();
      if (text.length > 0) {
        windows.push({ start, end: Math.min(end, content.length), text });
      }

      if (end >= content.length) {
        break;
      }

      start = end - overlap;
    }

    return windows;
  }

  /**
   * @throws InvalidChunkOptionsError unless chunkSize >= 1 and 0 <= overlap < chunkSize
   */
  validateOptions({ chunkSize, overlap }: ChunkOptions): void {
    const valid =
      Number.isInteger(chunkSize) &&
      Number.isInteger(overlap) &&
      chunkSize >= 1 &&
      overlap >= 0 &&
      overlap < chunkSize;

    if (!valid) {
      throw new InvalidChunkOptionsError(chunkSize, overlap);
    }
  }

  private alignToSentence(
    content: string,
    start: number,
    end: number,
    { chunkSize, overlap }: ChunkOptions,
  ): number {
    const lastTerminator = content
      .slice(start, end)
      .lastIndexOf(this.SENTENCE_TERMINATOR);

    if (
      lastTerminator > Math.floor(chunkSize / 2) &&
      lastTerminator + 1 > overlap
    ) {
      return start + lastTerminator + 1;
    }

    return end;
  }
}
