import { ColumnExtractorService } from './column-extractor.service';
import type { CsvTable } from '../types/load.types';

function table(headers: string[], rows: CsvTable['rows']): CsvTable {
  return { headers, rows, encoding: 'utf-8' };
}

describe('ColumnExtractorService', () => {
  const extractor = new ColumnExtractorService();

  it('joins the Korean content column with newlines', () => {
    const result = extractor.extract(
      table(['번호', '내용', '비고'], [
        ['1', '제1조 목적', 'x'],
        ['2', '제2조 정의', 'y'],
      ]),
    );

    expect(result).toEqual({
      content: '제1조 목적\n제2조 정의',
      sections: undefined,
      contentColumn: '내용',
    });
  });

  it('prefers 내용 over content when both exist', () => {
    const result = extractor.extract(
      table(['content', '내용'], [['english', 'korean']]),
    );

    expect(result.content).toBe('korean');
    expect(result.contentColumn).toBe('내용');
  });

  it('falls back to the rightmost column', () => {
    const result = extractor.extract(
      table(['id', 'title', 'body'], [['1', 't', 'first body'], ['2', 't', 'second body']]),
    );

    expect(result.content).toBe('first body\nsecond body');
    expect(result.contentColumn).toBe('body');
  });

  it('skips empty and missing cells', () => {
    const result = extractor.extract(
      table(['section', 'content'], [
        ['A', 'one'],
        ['B', ''],
        ['C'],
        ['D', 'two'],
      ]),
    );

    expect(result.content).toBe('one\ntwo');
  });

  it('collects distinct section values in first-seen order', () => {
    const result = extractor.extract(
      table(['구분', '내용'], [
        ['판시사항', 'a'],
        ['판결요지', 'b'],
        ['판시사항', 'c'],
        ['', 'd'],
      ]),
    );

    expect(result.sections).toBe('판시사항, 판결요지');
  });

  it('uses the first section column by priority', () => {
    const result = extractor.extract(
      table(['category', 'section', 'content'], [['cat', 'sec', 'text']]),
    );

    expect(result.sections).toBe('sec');
  });

  it('returns empty content for a header-only table', () => {
    expect(extractor.extract(table(['내용'], []))).toEqual({
      content: '',
      sections: undefined,
      contentColumn: '내용',
    });
  });

  describe('findColumn', () => {
    it('returns null when no candidate matches', () => {
      expect(extractor.findColumn(['a', 'b'], ['내용', 'content'])).toBeNull();
    });
  });
});
