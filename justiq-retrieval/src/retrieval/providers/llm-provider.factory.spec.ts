import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ChatOpenAI } from '@langchain/openai';
import { ChatOllama } from '@langchain/ollama';
import { LLMProviderFactory } from './llm-provider.factory';
import { CredentialResolver } from './credential-resolver';
import { MissingCredentialError } from '../errors';

describe('LLMProviderFactory', () => {
  let secretsDir: string;

  beforeEach(() => {
    secretsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'justiq-llm-'));
  });

  afterEach(() => {
    fs.rmSync(secretsDir, { recursive: true, force: true });
  });

  function createFactory(env: Record<string, string>): LLMProviderFactory {
    const configService = new ConfigService({ SECRETS_DIR: secretsDir, ...env });
    return new LLMProviderFactory(
      configService,
      new CredentialResolver(configService),
    );
  }

  it('defaults to OpenRouter through the OpenAI-compatible client', () => {
    fs.writeFileSync(path.join(secretsDir, 'OPENROUTER_API_KEY'), 'test-secret');

    const factory = createFactory({});
    const model = factory.createChatModel({ temperature: 0.7, maxTokens: 2000 });

    expect(factory.getProvider()).toBe('openrouter');
    expect(model).toBeInstanceOf(ChatOpenAI);
    expect(model).toMatchObject({
      model: 'meta-llama/llama-3.3-70b-instruct:free',
      temperature: 0.7,
      maxTokens: 2000,
    });
  });

  it('fails at construction when the provider has no credential', () => {
    expect(() => createFactory({ LLM_PROVIDER: 'anthropic' })).toThrow(
      MissingCredentialError,
    );
  });

  it('needs no credential for ollama', () => {
    const factory = createFactory({ LLM_PROVIDER: 'ollama' });

    expect(
      factory.createChatModel({ temperature: 0, maxTokens: 10 }),
    ).toBeInstanceOf(ChatOllama);
  });

  it('falls back to openrouter for an unknown provider', () => {
    fs.writeFileSync(path.join(secretsDir, 'OPENROUTER_API_KEY'), 'test-secret');

    expect(createFactory({ LLM_PROVIDER: 'unknown' }).getProvider()).toBe(
      'openrouter',
    );
  });
});
