import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AppConfig } from '../../src/types/config.types';
import { ChatMessage, LlmClient, ProbeOutcome } from '../../src/services/llm.service';

export const TEST_SECRET = 'test-secret-for-unit-tests';
export const GOOD_PASSWORD = 'Str0ng!Pass';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'project-files-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(usersDir: string): AppConfig {
  return {
    port: 0,
    nodeEnv: 'test',
    usersDir,
    auth: {
      jwtSecret: TEST_SECRET,
      jwtAlgorithm: 'HS256',
      accessTokenExpireMinutes: 30,
      bcryptRounds: 4,
    },
    llm: {
      baseUrl: 'http://llm.test/v1',
      model: 'test-model',
      probeTimeoutMs: 1000,
      chatTimeoutMs: 1000,
      circuitFailureThreshold: 3,
      circuitCooldownMs: 60000,
    },
    upload: {
      maxBytes: 1024,
      rateLimit: { windowMs: 60000, max: 1000 },
    },
    logging: { level: 'error', file: '', silent: true },
  };
}

/**
 * In-process stand-in for the language-model service.
 * Keys listed in validKeys probe as valid, everything else as invalid,
 * unless `unavailable` is set.
 */
export class FakeLlmClient implements LlmClient {
  readonly validKeys: Set<string>;
  unavailable = false;
  reply = 'fake reply';
  readonly probes: string[] = [];
  readonly chats: Array<{ apiKey: string; messages: ChatMessage[] }> = [];

  constructor(validKeys: string[] = []) {
    this.validKeys = new Set(validKeys);
  }

  async probe(apiKey: string): Promise<ProbeOutcome> {
    this.probes.push(apiKey);
    if (this.unavailable) {
      return 'unavailable';
    }
    return this.validKeys.has(apiKey) ? 'valid' : 'invalid';
  }

  async chat(apiKey: string, messages: ChatMessage[]): Promise<string> {
    this.chats.push({ apiKey, messages });
    return this.reply;
  }
}

/** Clock whose time only moves when told to */
export function manualClock(start = Date.parse('2024-05-01T12:00:00.000Z')) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

/**
 * Every path under dir, relative and sorted, with file contents, so two
 * snapshots compare equal only if nothing was added, removed or rewritten
 */
export async function snapshotTree(dir: string): Promise<string[]> {
  const entries: string[] = [];

  async function walk(current: string): Promise<void> {
    for (const dirent of await fs.readdir(current, { withFileTypes: true })) {
      const absolute = path.join(current, dirent.name);
      const relative = path.relative(dir, absolute);
      if (dirent.isDirectory()) {
        entries.push(`${relative}/`);
        await walk(absolute);
      } else {
        entries.push(`${relative}=${(await fs.readFile(absolute)).toString('base64')}`);
      }
    }
  }

  await walk(dir);
  return entries.sort();
}
