import fs from 'fs/promises';
import path from 'path';
import { MissingCredentialsError, SecretStoreError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { Credentials } from '../types/index.js';

export const SECRET_KEYS = ['USERNAME', 'PASSWORD', 'NOTIFY_TOKEN'] as const;
export type SecretKey = (typeof SECRET_KEYS)[number];

export interface SecretSource {
  get(key: SecretKey): Promise<string | undefined>;
}

export interface SecretStore extends SecretSource {
  set(key: SecretKey, value: string): Promise<void>;
  delete(key: SecretKey): Promise<void>;
}

const ENV_NAMES: Record<SecretKey, string> = {
  USERNAME: 'LMS_USERNAME',
  PASSWORD: 'LMS_PASSWORD',
  NOTIFY_TOKEN: 'NOTIFY_TOKEN',
};

/** Read-only source for CI, where secrets arrive as environment variables. */
export class EnvSecretSource implements SecretSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(key: SecretKey): Promise<string | undefined> {
    return this.env[ENV_NAMES[key]] || undefined;
  }
}

type SecretFile = Partial<Record<SecretKey, string>>;

/** JSON file readable only by the owner (mode 0600). */
export class FileSecretStore implements SecretStore {
  constructor(private readonly filePath: string) {}

  private async read(): Promise<SecretFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {};
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SecretStoreError(
        `Secrets file ${this.filePath} is not valid JSON (${describeError(error)}). Fix or delete it.`,
        { cause: error }
      );
    }
    const secrets: SecretFile = {};
    if (typeof parsed === 'object' && parsed !== null) {
      for (const key of SECRET_KEYS) {
        const value: unknown = Reflect.get(parsed, key);
        if (typeof value === 'string') secrets[key] = value;
      }
    }
    return secrets;
  }

  private async write(secrets: SecretFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(secrets, null, 2), { mode: 0o600 });
    await fs.chmod(this.filePath, 0o600);
  }

  async get(key: SecretKey): Promise<string | undefined> {
    const secrets = await this.read();
    return secrets[key] || undefined;
  }

  async set(key: SecretKey, value: string): Promise<void> {
    const secrets = await this.read();
    secrets[key] = value;
    await this.write(secrets);
  }

  async delete(key: SecretKey): Promise<void> {
    const secrets = await this.read();
    if (!(key in secrets)) return;
    delete secrets[key];
    await this.write(secrets);
  }
}

export async function resolveSecret(sources: SecretSource[], key: SecretKey): Promise<string | undefined> {
  for (const source of sources) {
    const value = await source.get(key);
    if (value) return value;
  }
  return undefined;
}

export async function resolveCredentials(sources: SecretSource[]): Promise<Credentials> {
  const username = await resolveSecret(sources, 'USERNAME');
  const password = await resolveSecret(sources, 'PASSWORD');
  if (!username || !password) {
    throw new MissingCredentialsError();
  }
  return { username, password };
}

export async function clearSecrets(store: SecretStore): Promise<void> {
  for (const key of SECRET_KEYS) {
    await store.delete(key);
  }
  logger.info('Stored credentials cleared');
}
