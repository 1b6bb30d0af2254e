import { afterEach, describe, expect, it, vi } from 'vitest';

import type { EnvSource } from '~/server/env';
import { loadSyncConfig } from '~/server/sync/syncConfig';
import { SyncService } from '~/server/sync/syncService';
import { MemoryKeyValueStore } from '~/server/sync/syncSessionStore';
import { SyncSessionManager } from '~/server/sync/syncSessions';
import type { SyncDeltaResponse } from '~/server/sync/syncTypes';
import { MemoryEntityStore } from '~/test-utils/memoryEntities';
import { createServiceTransport } from '~/test-utils/serviceTransport';
import { createSyncReplicaStore } from './store-sync-replica';
import { createSyncAgent, type SyncAgentOptions } from './syncAgent';
import type { SyncTransport } from './syncTransport';
import { createSyncTransportNoop } from './syncTransport.noop';

const NOW = '2026-05-01T12:00:00.000Z';
const HOUR_MS = 60 * 60 * 1000;

function setup(env: EnvSource = {}, agentOptions: Omit<SyncAgentOptions, 'transport'> = {}) {
  const clock = { t: Date.parse(NOW) };
  const entities = new MemoryEntityStore();
  const config = loadSyncConfig(env);
  let n = 0;
  const sessions = new SyncSessionManager(new MemoryKeyValueStore(() => clock.t), config, {
    keyPrefix: 'test',
    now: () => new Date(clock.t),
    newSessionId: () => `sync-s${++n}`,
  });
  const service = new SyncService({
    config,
    sessions,
    sources: entities.sources(),
    mutable: { summary: entities.mutableSource('summary') },
    now: () => new Date(clock.t),
  });
  const { transport, calls } = createServiceTransport(service, '42');
  const agent = createSyncAgent({ ...agentOptions, transport });
  return { clock, entities, service, calls, agent };
}

function offlineTransport(): SyncTransport {
  return {
    mode: 'http',
    startSession: vi.fn(async () => ({ ok: false as const, error: 'offline' })),
    getFull: async () => ({ ok: false, error: 'offline' }),
    getDelta: async () => ({ ok: false, error: 'offline' }),
    apply: async () => ({ ok: false, error: 'offline' }),
  };
}

describe('syncAgent pull', () => {
  it('bootstraps with a full page, then follows delta pages to the end', async () => {
    const { entities, calls, agent } = setup({ SYNC_DEFAULT_LIMIT: '2' });
    entities.insert('42', 'user', '42', { username: 'alice' });
    entities.insert('42', 'request', 1, { status: 'ok' });
    entities.insert('42', 'summary', 1, { is_read: false });
    entities.insert('42', 'request', 2, { status: 'ok' });
    entities.insert('42', 'summary', 2, { is_read: true }, { deleted: true });

    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 5, pushed: 0 });
    expect(calls.getFull).toBe(1);
    expect(calls.getDelta).toEqual([2, 4]);

    const state = agent.store.getState();
    expect(state.watermark).toBe(5);
    expect(Object.keys(state.records).sort()).toEqual(['request:1', 'request:2', 'summary:1', 'summary:2', 'user:42']);
    expect(state.records['summary:2']?.payload).toBeUndefined();
    expect(state.records['summary:1']?.payload).toEqual({ is_read: false });
  });

  it('pulls only the delta once bootstrapped', async () => {
    const { entities, calls, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });
    await agent.syncOnce();

    entities.update('summary', 1, { is_read: true });
    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 1, pushed: 0 });
    expect(calls.getFull).toBe(1);
    expect(calls.getDelta).toEqual([1]);
    expect(agent.store.getState().records['summary:1']).toMatchObject({ server_version: 2, payload: { is_read: true } });
    expect(agent.store.getState().watermark).toBe(2);
  });

  it('stops paging when the cursor does not move', async () => {
    const empty: SyncDeltaResponse = { session_id: 's', since: 5, has_more: true, next_since: 5, created: [], updated: [], deleted: [] };
    const getDelta = vi.fn(async () => ({ ok: true as const, value: empty }));
    const transport: SyncTransport = { ...offlineTransport(), getDelta };
    const store = createSyncReplicaStore();
    store.getState().setSessionId('s');
    store.getState().advanceWatermark(5);

    const result = await createSyncAgent({ transport, store }).syncOnce();

    expect(result).toEqual({ ok: true, pulled: 0, pushed: 0 });
    expect(getDelta).toHaveBeenCalledTimes(1);
  });
});

describe('syncAgent push', () => {
  it('applies a queued update and advances the local record', async () => {
    const { entities, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });
    await agent.syncOnce();

    agent.queueUpdate('summary', 1, { is_read: true });
    expect(agent.store.getState().pending['summary:1']?.last_seen_version).toBe(1);

    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 0, pushed: 1 });
    const state = agent.store.getState();
    expect(state.pending).toEqual({});
    expect(state.records['summary:1']).toEqual({
      entity_type: 'summary',
      id: 1,
      server_version: 2,
      updated_at: NOW,
      payload: { is_read: true },
    });
    expect(entities.snapshot('42')[0]?.payload).toEqual({ is_read: true });
  });

  it('sends pending changes in batches the server accepts', async () => {
    const { entities, calls, agent } = setup({ SYNC_MAX_APPLY_ITEMS: '2' }, { applyBatchSize: 2 });
    entities.insert('42', 'summary', 1, { is_read: false });
    entities.insert('42', 'summary', 2, { is_read: false });
    entities.insert('42', 'summary', 3, { is_read: false });
    await agent.syncOnce();

    agent.queueUpdate('summary', 1, { is_read: true });
    agent.queueUpdate('summary', 2, { is_read: true });
    agent.queueUpdate('summary', 3, { is_read: true });

    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 0, pushed: 3 });
    expect(calls.apply).toBe(2);
    expect(agent.store.getState().pending).toEqual({});
    expect(entities.snapshot('42').map(row => row.payload)).toEqual([
      { is_read: true },
      { is_read: true },
      { is_read: true },
    ]);
  });

  it('turns an applied delete into a local tombstone', async () => {
    const { entities, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });
    await agent.syncOnce();

    agent.queueDelete('summary', 1);
    await agent.syncOnce();

    expect(agent.store.getState().records['summary:1']).toEqual({
      entity_type: 'summary',
      id: 1,
      server_version: 2,
      updated_at: NOW,
      deleted_at: NOW,
    });
  });

  it('requeues a conflicting change against the server snapshot, then applies it', async () => {
    const { entities, calls, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false, lang: 'en' });
    await agent.syncOnce();

    agent.queueUpdate('summary', 1, { is_read: true });
    entities.update('summary', 1, { lang: 'de' });

    const first = await agent.syncOnce();
    expect(first).toEqual({ ok: true, pulled: 1, pushed: 0 });
    expect(agent.store.getState().pending['summary:1']).toEqual({
      entity_type: 'summary',
      id: 1,
      action: 'update',
      last_seen_version: 2,
      fields: { is_read: true },
    });

    const second = await agent.syncOnce();
    expect(second).toEqual({ ok: true, pulled: 0, pushed: 1 });
    expect(agent.store.getState().pending).toEqual({});
    expect(entities.snapshot('42')[0]?.payload).toEqual({ is_read: true, lang: 'de' });
    expect(calls.apply).toBe(2);
  });

  it('drops a conflicting change the server state already satisfies', async () => {
    const { entities, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });
    await agent.syncOnce();

    // queued before the server-side write is seen
    agent.store.getState().queueChange({ entity_type: 'summary', id: 1, action: 'update', last_seen_version: 0, fields: { is_read: true } });
    entities.update('summary', 1, { is_read: true });

    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 1, pushed: 0 });
    expect(agent.store.getState().pending).toEqual({});
    expect(entities.lastVersion).toBe(2);
  });

  it('drops invalid changes and reports the last one', async () => {
    const { entities, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });
    await agent.syncOnce();

    agent.queueUpdate('request', 1, { status: 'done' });
    agent.queueUpdate('summary', 99, { is_read: true });
    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 0, pushed: 0 });
    const state = agent.store.getState();
    expect(state.pending).toEqual({});
    expect(state.lastError).toBe('summary:99: NOT_FOUND');
  });
});

describe('syncAgent queueing', () => {
  it('merges updates and lets a pending delete win', () => {
    const agent = createSyncAgent({ transport: createSyncTransportNoop() });
    agent.store.getState().upsertRecord({ entity_type: 'summary', id: 1, server_version: 7, updated_at: NOW, payload: { is_read: false } });

    agent.queueUpdate('summary', 1, { is_read: true });
    agent.queueUpdate('summary', 1, { lang: 'en' });
    expect(agent.store.getState().pending['summary:1']).toEqual({
      entity_type: 'summary',
      id: 1,
      action: 'update',
      last_seen_version: 7,
      fields: { is_read: true, lang: 'en' },
    });

    agent.queueDelete('summary', 1);
    agent.queueUpdate('summary', 1, { is_read: false });
    expect(agent.store.getState().pending['summary:1']).toEqual({
      entity_type: 'summary',
      id: 1,
      action: 'delete',
      last_seen_version: 7,
      fields: {},
    });
  });

  it('keeps changes queued while sync is disabled', async () => {
    const agent = createSyncAgent({ transport: createSyncTransportNoop() });
    agent.queueDelete('summary', 3);

    expect(await agent.syncOnce()).toEqual({ ok: false, error: 'sync disabled' });
    expect(Object.keys(agent.store.getState().pending)).toEqual(['summary:3']);
  });
});

describe('syncAgent sessions', () => {
  it('starts a new session once when the current one expired', async () => {
    const { clock, entities, calls, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });
    await agent.syncOnce();
    expect(agent.store.getState().sessionId).toBe('sync-s1');

    clock.t += 2 * HOUR_MS;
    entities.update('summary', 1, { is_read: true });
    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: true, pulled: 1, pushed: 0 });
    expect(calls.startSession).toBe(2);
    expect(agent.store.getState().sessionId).toBe('sync-s2');
  });

  it('does not retry a session owned by someone else', async () => {
    const { service } = setup();
    const { session_id } = await service.startSession({ ownerId: '7', clientId: null });

    const store = createSyncReplicaStore();
    store.getState().setSessionId(session_id);
    const { transport, calls } = createServiceTransport(service, '42');
    const agent = createSyncAgent({ transport, store });

    const result = await agent.syncOnce();

    expect(result).toEqual({ ok: false, error: 'session_forbidden' });
    expect(store.getState().lastError).toBe('session_forbidden');
    expect(store.getState().sessionId).toBe(session_id);
    expect(calls.startSession).toBe(0);
  });

  it('shares one run between overlapping calls', async () => {
    const { entities, calls, agent } = setup();
    entities.insert('42', 'summary', 1, { is_read: false });

    const a = agent.syncOnce();
    const b = agent.syncOnce();

    expect(b).toBe(a);
    await a;
    expect(calls.getFull).toBe(1);
  });
});

describe('syncAgent polling', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on each interval until stopped', async () => {
    vi.useFakeTimers();
    const transport = offlineTransport();
    const agent = createSyncAgent({ transport });

    agent.start(1000);
    await vi.advanceTimersByTimeAsync(2000);
    expect(transport.startSession).toHaveBeenCalledTimes(2);
    expect(agent.store.getState().lastError).toBe('offline');

    agent.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(transport.startSession).toHaveBeenCalledTimes(2);
  });
});
