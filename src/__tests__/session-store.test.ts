import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { setImmediate as tick } from 'node:timers/promises';

import { ChatSession } from '../engine/chat-session.js';
import { engineEvents } from '../engine/events.js';
import type { SessionStoreOptions } from '../engine/session-store.js';
import { SESSIONS_URI, SessionStore, sessionUri } from '../engine/session-store.js';
import { SessionNotFoundError } from '../lib/errors.js';
import { BUILTIN_TOOLS } from '../registry/builtin.js';
import { ToolRegistry } from '../registry/registry.js';

import { deferred, ScriptedCollaborator, selectTool } from './fixtures.js';

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function createStore(
  options: Omit<SessionStoreOptions, 'createSession'> = {},
  collaborator = new ScriptedCollaborator()
): SessionStore {
  const registry = new ToolRegistry(BUILTIN_TOOLS);
  return new SessionStore({
    ...options,
    createSession: (id) => new ChatSession({ id, registry, collaborator }),
  });
}

describe('SessionStore', () => {
  describe('create', () => {
    it('assigns a random UUID by default', () => {
      const store = createStore();
      try {
        assert.match(store.create().id, UUID_PATTERN);
      } finally {
        store.dispose();
      }
    });

    it('rejects a duplicate id', () => {
      const store = createStore();
      try {
        store.create('dup');
        assert.throws(() => store.create('dup'), /Session already exists: dup/);
      } finally {
        store.dispose();
      }
    });

    it('evicts the least recently used session at capacity', () => {
      const store = createStore({ maxSessions: 2 });
      const evicted: string[] = [];
      const onEvicted = (data: { sessionId: string }): void => {
        evicted.push(data.sessionId);
      };
      engineEvents.on('session:evicted', onEvicted);
      try {
        store.create('a');
        store.create('b');
        store.touch('a');
        store.create('c');

        assert.deepEqual(evicted, ['b']);
        assert.deepEqual(store.listSessionIds(), ['c', 'a']);
        assert.equal(store.size, 2);
      } finally {
        engineEvents.off('session:evicted', onEvicted);
        store.dispose();
      }
    });
  });

  describe('eviction', () => {
    it('skips sessions that are processing input', async () => {
      const gate = deferred<string>();
      const store = createStore(
        { maxSessions: 2 },
        new ScriptedCollaborator([gate.promise])
      );
      try {
        const busy = store.create('busy');
        const pending = busy.send('convert something');
        await tick();
        store.create('idle');
        store.create('new');

        assert.deepEqual(store.listSessionIds(), ['new', 'busy']);
        gate.resolve(selectTool('convert_temperature'));
        const turn = await pending;
        assert.equal(turn.status.state, 'collecting_parameters');
        assert.equal(store.get('busy'), busy);
      } finally {
        store.dispose();
      }
    });

    it('may exceed capacity while every session is busy', async () => {
      const gate = deferred<string>();
      const store = createStore(
        { maxSessions: 1 },
        new ScriptedCollaborator([gate.promise])
      );
      try {
        const busy = store.create('busy');
        const pending = busy.send('convert something');
        await tick();
        store.create('extra');

        assert.equal(store.size, 2);
        gate.resolve(selectTool('convert_temperature'));
        await pending;
      } finally {
        store.dispose();
      }
    });
  });

  describe('lookup', () => {
    it('getOrThrow raises SessionNotFoundError for unknown ids', () => {
      const store = createStore();
      try {
        assert.equal(store.get('missing'), undefined);
        assert.throws(
          () => store.getOrThrow('missing'),
          (err: unknown) =>
            err instanceof SessionNotFoundError &&
            err.code === 'E_SESSION_NOT_FOUND'
        );
      } finally {
        store.dispose();
      }
    });

    it('lists summaries newest first', () => {
      const store = createStore();
      try {
        store.create('first');
        store.create('second');
        assert.deepEqual(
          store.listSummaries().map((summary) => [summary.id, summary.state]),
          [
            ['second', 'idle'],
            ['first', 'idle'],
          ]
        );
      } finally {
        store.dispose();
      }
    });

    it('reports expiry relative to the last activity', () => {
      const store = createStore({ ttlMs: 5000 });
      try {
        const session = store.create('s');
        assert.equal(store.getTtlMs(), 5000);
        assert.equal(store.getExpiresAt('s'), session.updatedAt + 5000);
        assert.equal(store.getExpiresAt('other'), undefined);
      } finally {
        store.dispose();
      }
    });
  });

  describe('touch', () => {
    it('announces updates for the session and the collection', () => {
      const store = createStore();
      const uris: string[] = [];
      const onUpdated = (data: { uri: string }): void => {
        uris.push(data.uri);
      };
      try {
        store.create('s');
        engineEvents.on('resource:updated', onUpdated);
        store.touch('s');
        assert.deepEqual(uris, [sessionUri('s'), SESSIONS_URI]);
      } finally {
        engineEvents.off('resource:updated', onUpdated);
        store.dispose();
      }
    });
  });

  describe('sweep', () => {
    it('expires sessions idle longer than the TTL', () => {
      const store = createStore({ ttlMs: 1000 });
      try {
        const session = store.create('old');
        assert.equal(store.sweep(session.updatedAt + 1000), 0);
        assert.equal(store.sweep(session.updatedAt + 1001), 1);
        assert.equal(store.get('old'), undefined);
      } finally {
        store.dispose();
      }
    });

    it('keeps sessions that are processing input', async () => {
      const gate = deferred<string>();
      const store = createStore({ ttlMs: 1000 }, new ScriptedCollaborator([gate.promise]));
      try {
        const session = store.create('busy');
        const pending = session.send('convert something');
        await tick();

        assert.equal(store.sweep(session.updatedAt + 10_000), 0);
        gate.resolve(selectTool('convert_temperature'));
        await pending;
        assert.equal(store.sweep(session.updatedAt + 10_000), 1);
      } finally {
        store.dispose();
      }
    });
  });

  describe('dispose', () => {
    it('cancels active workflows and empties the store', async () => {
      const store = createStore(
        {},
        new ScriptedCollaborator([selectTool('convert_temperature')])
      );
      const session = store.create('s');
      await session.send('convert');
      assert.equal(session.status().state, 'collecting_parameters');

      store.dispose();
      assert.equal(store.size, 0);
      assert.equal(session.status().state, 'idle');
    });
  });
});
