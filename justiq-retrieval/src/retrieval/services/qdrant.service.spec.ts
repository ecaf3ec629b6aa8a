import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { QdrantService } from './qdrant.service';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { VectorSearchError } from '../errors';
import { QDRANT_CLIENT } from '../retrieval.constants';

describe('QdrantService', () => {
  const client = { search: jest.fn() };
  const embeddingModel = { embedQuery: jest.fn() };
  let service: QdrantService;

  beforeEach(async () => {
    client.search.mockReset();
    embeddingModel.embedQuery.mockReset().mockResolvedValue([0.5, 0.25]);

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => ({ QDRANT_COLLECTION: 'legal_documents' })],
        }),
      ],
      providers: [
        QdrantService,
        { provide: QDRANT_CLIENT, useValue: client },
        {
          provide: EmbeddingProviderFactory,
          useValue: { createEmbeddingModel: () => embeddingModel },
        },
      ],
    }).compile();

    service = moduleRef.get(QdrantService);
  });

  it('maps scored points to results with distance = 1 - score', async () => {
    client.search.mockResolvedValue([
      {
        id: 'p1',
        version: 1,
        score: 0.75,
        payload: {
          content: 'Chunk text',
          metadata: { docId: 'law_001', typeName: 'Statute' },
        },
      },
      { id: 'p2', version: 1, score: 0.5, payload: null },
    ]);

    const results = await service.search('question', 2, null);

    expect(results).toEqual([
      {
        content: 'Chunk text',
        metadata: { docId: 'law_001', typeName: 'Statute' },
        distance: 0.25,
      },
      { content: '', metadata: {}, distance: 0.5 },
    ]);
    expect(client.search).toHaveBeenCalledWith('legal_documents', {
      vector: [0.5, 0.25],
      limit: 2,
      with_payload: true,
    });
  });

  it('filters on the chunk category', async () => {
    client.search.mockResolvedValue([]);

    await service.search('question', 5, 'interpretation');

    expect(client.search).toHaveBeenCalledWith('legal_documents', {
      vector: [0.5, 0.25],
      limit: 5,
      with_payload: true,
      filter: {
        must: [{ key: 'metadata.type', match: { value: 'interpretation' } }],
      },
    });
  });

  it('wraps embedding failures', async () => {
    embeddingModel.embedQuery.mockRejectedValue(new Error('ollama down'));

    await expect(service.search('q', 5, null)).rejects.toThrow(
      new VectorSearchError('ollama down'),
    );
    expect(client.search).not.toHaveBeenCalled();
  });

  it('wraps client failures', async () => {
    client.search.mockRejectedValue(new Error('Not Found'));

    await expect(service.search('q', 5, null)).rejects.toBeInstanceOf(
      VectorSearchError,
    );
  });
});
