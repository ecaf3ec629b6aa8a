import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as iconv from 'iconv-lite';
import { LoadStage } from './load.stage';
import { LoadStageModule } from './load-stage.module';

async function writeCsv(
  root: string,
  category: string,
  name: string,
  content: string | Buffer,
): Promise<string> {
  const dir = path.join(root, category);
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content);
  return filePath;
}

describe('LoadStage', () => {
  let stage: LoadStage;
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'justiq-load-'));

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ ignoreEnvFile: true, isGlobal: true }),
        LoadStageModule,
      ],
    }).compile();

    stage = moduleRef.get(LoadStage);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('loads one document per file with category metadata', async () => {
    const filePath = await writeCsv(
      dataDir,
      'statute',
      'criminal_procedure.csv',
      '구분,내용\n총칙,제1조 목적\n총칙,제2조 정의\n',
    );

    const output = await stage.execute({ dataDir });

    expect(output.documents).toEqual([
      {
        content: '제1조 목적\n제2조 정의',
        metadata: {
          docId: 'criminal_procedure',
          filePath,
          type: 'statute',
          typeName: 'Statute',
          sections: '총칙',
        },
      },
    ]);
    expect(output.failures).toEqual([]);
  });

  it('reports categories whose directory is missing', async () => {
    await writeCsv(dataDir, 'decision', 'd1.csv', 'content\ntext\n');

    const output = await stage.execute({ dataDir });

    expect(output.missingCategories).toEqual([
      'judgement',
      'statute',
      'interpretation',
    ]);
    expect(output.documents.map((d) => d.metadata.type)).toEqual(['decision']);
  });

  it('treats a missing data directory as all categories missing', async () => {
    const output = await stage.execute({
      dataDir: path.join(dataDir, 'absent'),
    });

    expect(output.documents).toEqual([]);
    expect(output.missingCategories).toEqual([
      'judgement',
      'decision',
      'statute',
      'interpretation',
    ]);
  });

  it('visits categories in order and files sorted by name', async () => {
    await writeCsv(dataDir, 'interpretation', 'i1.csv', 'content\ni\n');
    await writeCsv(dataDir, 'judgement', 'b.csv', 'content\nb\n');
    await writeCsv(dataDir, 'judgement', 'a.csv', 'content\na\n');

    const output = await stage.execute({ dataDir });

    expect(output.documents.map((d) => d.metadata.docId)).toEqual([
      'a',
      'b',
      'i1',
    ]);
  });

  it('ignores files that are not CSV', async () => {
    await writeCsv(dataDir, 'statute', 'notes.txt', 'content\nx\n');
    await writeCsv(dataDir, 'statute', 'law.CSV', 'content\nx\n');

    const output = await stage.execute({ dataDir });

    expect(output.documents.map((d) => d.metadata.docId)).toEqual(['law']);
  });

  it('skips a malformed file and keeps loading the rest', async () => {
    const badPath = await writeCsv(
      dataDir,
      'judgement',
      'bad.csv',
      'a,b\n1,2,3\n',
    );
    await writeCsv(dataDir, 'judgement', 'good.csv', 'content\nfine\n');

    const output = await stage.execute({ dataDir });

    expect(output.documents.map((d) => d.metadata.docId)).toEqual(['good']);
    expect(output.failures).toEqual([
      {
        filePath: badPath,
        category: 'judgement',
        code: 'LOAD_MALFORMED_CSV',
        message: `Malformed CSV ${badPath}: expected 2 fields in record 1, saw 3`,
      },
    ]);
  });

  it('loads CP949 encoded files', async () => {
    await writeCsv(
      dataDir,
      'decision',
      'legacy.csv',
      iconv.encode('구분,내용\n주문,기각한다.\n', 'cp949'),
    );

    const output = await stage.execute({ dataDir });

    expect(output.documents[0].content).toBe('기각한다.');
    expect(output.documents[0].metadata.sections).toBe('주문');
  });

  it('records an undecodable file as an encoding failure', async () => {
    const badPath = await writeCsv(
      dataDir,
      'decision',
      'binary.csv',
      Buffer.concat([
        Buffer.from('content\n'),
        Buffer.from([0xff, 0xfe, 0xff, 0x80, 0x0a]),
      ]),
    );
    await writeCsv(dataDir, 'decision', 'text.csv', 'content\nok\n');

    const output = await stage.execute({ dataDir });

    expect(output.documents.map((d) => d.metadata.docId)).toEqual(['text']);
    expect(output.failures).toEqual([
      {
        filePath: badPath,
        category: 'decision',
        code: 'LOAD_ENCODING_FAILED',
        message: `Unable to decode ${badPath} (tried utf-8, cp949)`,
      },
    ]);
  });

  it('omits sections when the file has no section column', async () => {
    await writeCsv(dataDir, 'statute', 'plain.csv', 'content\ntext\n');

    const output = await stage.execute({ dataDir });

    expect(output.documents[0].metadata).not.toHaveProperty('sections');
  });

  it('loads a header-only file as an empty document', async () => {
    await writeCsv(dataDir, 'statute', 'header_only.csv', '내용\n');

    const output = await stage.execute({ dataDir });

    expect(output.documents).toHaveLength(1);
    expect(output.documents[0].content).toBe('');
  });
});
