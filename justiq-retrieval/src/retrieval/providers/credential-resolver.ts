/**
 * Credential Resolver
 * Looks an API key up in an ordered list of sources; the first non-empty
 * value wins.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'fs';
import { join } from 'path';
import { MissingCredentialError } from '../errors';

export interface CredentialSource {
  readonly name: string;
  get(key: string): string | undefined;
}

/**
 * Deployment secret store: one file per key, e.g. `/run/secrets/OPENAI_API_KEY`
 */
export class SecretsDirectorySource implements CredentialSource {
  readonly name = 'secrets directory';

  constructor(private readonly directory: string) {}

  get(key: string): string | undefined {
    try {
      const value = readFileSync(join(this.directory, key), 'utf8').trim();
      return value.length > 0 ? value : undefined;
    } catch (error) {
      if (isAbsentFileError(error)) {
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * Process environment and `.env`, through ConfigService
 */
export class ConfigCredentialSource implements CredentialSource {
  readonly name = 'environment';

  constructor(private readonly configService: ConfigService) {}

  get(key: string): string | undefined {
    const value = this.configService.get<string>(key)?.trim();
    return value ? value : undefined;
  }
}

@Injectable()
export class CredentialResolver {
  private readonly logger = new Logger(CredentialResolver.name);
  private readonly sources: CredentialSource[];

  constructor(configService: ConfigService) {
    this.sources = [
      new SecretsDirectorySource(
        configService.get<string>('SECRETS_DIR', '/run/secrets'),
      ),
      new ConfigCredentialSource(configService),
    ];
  }

  resolve(key: string): string | undefined {
    for (const source of this.sources) {
      const value = source.get(key);
      if (value !== undefined) {
        this.logger.log(`Resolved ${key} from ${source.name}`);
        return value;
      }
    }
    return undefined;
  }

  /**
   * @throws MissingCredentialError when no source has the key
   */
  require(key: string, provider: string): string {
    const value = this.resolve(key);
    if (value === undefined) {
      throw new MissingCredentialError(key, provider);
    }
    return value;
  }
}

function isAbsentFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' ||
      error.code === 'ENOTDIR' ||
      error.code === 'EISDIR')
  );
}
