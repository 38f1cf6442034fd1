/**
 * SessionStore Unit Tests
 *
 * Tests for:
 * - Save/load through the session file
 * - Missing, corrupt and schema-invalid files
 * - Listing order and skipping unreadable files
 * - Deletion and session id validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SessionCorrupt } from '../utils/errors.js';
import type { SessionRecord } from '../types/index.js';
import { createTestLogger } from '../../tests/helpers/fakes.js';
import { createSession, generateSessionId, isValidSessionId, SessionStore, summarize } from './SessionStore.js';

function record(id: string, updatedAt: number, overrides: Partial<SessionRecord['session']> = {}): SessionRecord {
  return {
    version: 1,
    session: { ...createSession(id, new Date(2026, 9, 19, 9, 0, 0)), updatedAt, ...overrides },
    dispatcher: {
      history: [{ ordinal: 0, role: 'user', content: 'hello', timestamp: 1 }],
    },
    workers: {},
  };
}

describe('SessionStore', () => {
  let dir: string;
  let store: SessionStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'intakebot-sessions-'));
    store = new SessionStore(dir, createTestLogger());
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should save and load a session', async () => {
    const saved = record('s1', 100, { requesterId: 'Sato' });
    await store.save(saved);

    expect(await store.load('s1')).toEqual(saved);
    expect(await fs.readdir(dir)).toEqual(['session_s1.json']);
  });

  it('should return null for an unknown session', async () => {
    expect(await store.load('missing')).toBeNull();
  });

  it('should report a file that is not JSON as corrupt', async () => {
    await fs.writeFile(path.join(dir, 'session_bad.json'), '{not json', 'utf-8');

    await expect(store.load('bad')).rejects.toBeInstanceOf(SessionCorrupt);
  });

  it('should report a file that fails the schema as corrupt', async () => {
    await fs.writeFile(path.join(dir, 'session_bad.json'), JSON.stringify({ version: 2 }), 'utf-8');

    const error = await store.load('bad').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SessionCorrupt);
    expect(error).toMatchObject({ code: 'SESSION_CORRUPT', sessionId: 'bad' });
  });

  it('should refuse to save an invalid record', async () => {
    const invalid = record('s1', 100, { applicationDate: '19/10/2026' });

    await expect(store.save(invalid)).rejects.toThrow('Refusing to save invalid session s1');
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should list sessions newest first and skip unreadable files', async () => {
    await store.save(record('older', 100));
    await store.save(record('newer', 200, { requesterId: 'Sato' }));
    await fs.writeFile(path.join(dir, 'session_broken.json'), '[]', 'utf-8');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored', 'utf-8');

    const summaries = await store.list();

    expect(summaries).toEqual([
      { id: 'newer', requesterId: 'Sato', activeWorker: undefined, workerState: undefined, updatedAt: 200 },
      { id: 'older', requesterId: undefined, activeWorker: undefined, workerState: undefined, updatedAt: 100 },
    ]);
  });

  it('should list nothing when the directory does not exist', async () => {
    const missing = new SessionStore(path.join(dir, 'nope'), createTestLogger());
    expect(await missing.list()).toEqual([]);
  });

  it('should delete a session', async () => {
    await store.save(record('s1', 100));

    expect(await store.delete('s1')).toBe(true);
    expect(await store.delete('s1')).toBe(false);
    expect(await store.load('s1')).toBeNull();
  });

  it('should reject ids that could escape the directory', () => {
    expect(() => store.getSessionPath('../etc')).toThrow('Invalid session id: ../etc');
    expect(store.getSessionPath('abc_1')).toBe(path.join(dir, 'session_abc_1.json'));
  });
});

describe('session helpers', () => {
  it('should generate ids from the local time with an optional prefix', () => {
    const now = new Date(2026, 9, 19, 8, 5, 3);

    expect(generateSessionId('pfx', now)).toMatch(/^pfx_20261019_080503_[0-9a-f]{8}$/);
    expect(generateSessionId(undefined, now)).toMatch(/^20261019_080503_[0-9a-f]{8}$/);
    expect(isValidSessionId(generateSessionId('pfx', now))).toBe(true);
  });

  it('should validate session ids', () => {
    expect(isValidSessionId('a-b_C1')).toBe(true);
    expect(isValidSessionId('a/b')).toBe(false);
    expect(isValidSessionId('')).toBe(false);
  });

  it('should create a session dated today', () => {
    const now = new Date(2026, 9, 19, 8, 5, 3);
    expect(createSession('s1', now)).toEqual({
      id: 's1',
      applicationDate: '2026-10-19',
      createdAt: now.getTime(),
      updatedAt: now.getTime(),
    });
  });

  it('should summarize the active worker state', () => {
    const saved = record('s1', 100, { activeWorker: 'receipt' });
    saved.workers.receipt = {
      state: {
        type: 'receipt',
        state: 'CollectingFields',
        fields: {},
        items: [],
        itemsClosed: false,
        lastErrors: [],
      },
      history: [],
    };

    expect(summarize(saved)).toEqual({
      id: 's1',
      requesterId: undefined,
      activeWorker: 'receipt',
      workerState: 'CollectingFields',
      updatedAt: 100,
    });
  });
});
