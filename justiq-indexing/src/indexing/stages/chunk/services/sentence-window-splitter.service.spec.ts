import { SentenceWindowSplitterService } from './sentence-window-splitter.service';
import { InvalidChunkOptionsError } from '../errors';

describe('SentenceWindowSplitterService', () => {
  let splitter: SentenceWindowSplitterService;

  beforeEach(() => {
    splitter = new SentenceWindowSplitterService();
  });

  it('returns no windows for empty content', () => {
    expect(splitter.split('', { chunkSize: 1000, overlap: 200 })).toEqual([]);
  });

  it('returns one trimmed window when content fits in a chunk', () => {
    expect(
      splitter.split('  Hello world.  ', { chunkSize: 1000, overlap: 200 }),
    ).toEqual([{ start: 0, end: 16, text: 'Hello world.' }]);
  });

  it('returns one window when content length equals the chunk size', () => {
    const content = 'x'.repeat(50);
    const windows = splitter.split(content, { chunkSize: 50, overlap: 10 });

    expect(windows).toEqual([{ start: 0, end: 50, text: content }]);
  });

  it('cuts after the last period past the window midpoint', () => {
    const windows = splitter.split(
      'Sentence one. Sentence two. Sentence three.',
      { chunkSize: 20, overlap: 5 },
    );

    expect(windows).toEqual([
      { start: 0, end: 13, text: 'Sentence one.' },
      { start: 8, end: 27, text: 'one. Sentence two.' },
      { start: 22, end: 42, text: 'two. Sentence three' },
      { start: 37, end: 43, text: 'three.' },
    ]);
  });

  it('aligns Korean statute text on sentence ends', () => {
    const content =
      '제1조(목적) 이 법은 형사절차를 정한다. 제2조(정의) 이 법에서 사용하는 용어의 뜻은 다음과 같다. 피고인은 무죄로 추정된다.';

    const texts = splitter
      .split(content, { chunkSize: 30, overlap: 5 })
      .map((window) => window.text);

    expect(texts).toEqual([
      '제1조(목적) 이 법은 형사절차를 정한다.',
      '정한다. 제2조(정의) 이 법에서 사용하는 용어의 뜻',
      '용어의 뜻은 다음과 같다. 피고인은 무죄로 추정된다.',
    ]);
  });

  it('does not align on question or exclamation marks', () => {
    const windows = splitter.split('Is this theft? Yes, under art 329 it is', {
      chunkSize: 20,
      overlap: 5,
    });

    expect(windows).toEqual([
      { start: 0, end: 20, text: 'Is this theft? Yes,' },
      { start: 15, end: 35, text: 'Yes, under art 329 i' },
      { start: 30, end: 39, text: '329 it is' },
    ]);
  });

  it('keeps full-size windows when there is no sentence terminator', () => {
    const windows = splitter.split('a'.repeat(25), {
      chunkSize: 10,
      overlap: 2,
    });

    expect(windows.map(({ start, end }) => [start, end])).toEqual([
      [0, 10],
      [8, 18],
      [16, 25],
    ]);
  });

  it('ignores a terminator whose cut would not advance past the overlap', () => {
    const windows = splitter.split('abcdefg. hijklmnopqrstu', {
      chunkSize: 10,
      overlap: 8,
    });

    expect(windows[0]).toEqual({ start: 0, end: 10, text: 'abcdefg. h' });
    expect(windows[windows.length - 1]).toEqual({
      start: 14,
      end: 23,
      text: 'mnopqrstu',
    });
    expect(windows).toHaveLength(8);
  });

  it('skips whitespace-only windows', () => {
    const windows = splitter.split(`abc${' '.repeat(30)}def`, {
      chunkSize: 10,
      overlap: 0,
    });

    expect(windows).toEqual([
      { start: 0, end: 10, text: 'abc' },
      { start: 30, end: 36, text: 'def' },
    ]);
  });

  it('covers the whole content with consecutive windows sharing the overlap', () => {
    const content = Array.from(
      { length: 60 },
      (_, i) => `Clause ${i} applies to case ${i * 7}.`,
    ).join(' ');
    const overlap = 40;

    const windows = splitter.split(content, { chunkSize: 200, overlap });

    expect(windows[0].start).toBe(0);
    expect(windows[windows.length - 1].end).toBe(content.length);
    for (let i = 1; i < windows.length; i++) {
      expect(windows[i].start).toBe(windows[i - 1].end - overlap);
      expect(windows[i].end).toBeGreaterThan(windows[i - 1].end);
    }
  });

  it('is deterministic', () => {
    const content = 'First. Second sentence here. Third one follows. Last.';
    const options = { chunkSize: 16, overlap: 4 };

    expect(splitter.split(content, options)).toEqual(
      splitter.split(content, options),
    );
  });

  it.each([
    [0, 0],
    [10, 10],
    [10, 12],
    [10, -1],
    [10.5, 2],
  ])('rejects chunkSize=%p overlap=%p', (chunkSize, overlap) => {
    expect(() => splitter.split('text', { chunkSize, overlap })).toThrow(
      InvalidChunkOptionsError,
    );
  });
});
