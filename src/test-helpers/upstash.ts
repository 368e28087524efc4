import { createFakeFetch, jsonResponse, type FakeFetch } from './fetch.js';
import { COMPARE_AND_SET_SCRIPT } from '../repositories/redis.js';

interface Entry {
  value: string;
  expiresAt: number | null;
}

export interface FakeUpstashHooks {
  /** Runs before each command is applied; tests use it to interleave writers. */
  beforeCommand?: (command: string[]) => void;
}

export interface FakeUpstash extends FakeFetch {
  strings: Map<string, Entry>;
  lists: Map<string, string[]>;
  hooks: FakeUpstashHooks;
}

/**
 * In-process stand-in for the Upstash Redis REST API, covering the commands
 * the job store and queue use. Expiry follows the injected clock.
 */
export function createFakeUpstash(now: () => number = Date.now, token = 'test-token'): FakeUpstash {
  const strings = new Map<string, Entry>();
  const lists = new Map<string, string[]>();
  const hooks: FakeUpstashHooks = {};

  const live = (key: string): Entry | undefined => {
    const entry = strings.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= now()) {
      strings.delete(key);
      return undefined;
    }
    return entry;
  };

  const fake = createFakeFetch((request) => {
    if (request.headers.get('authorization') !== `Bearer ${token}`) {
      return new Response('unauthorized', { status: 401, statusText: 'Unauthorized' });
    }
    const command = Array.isArray(request.body) ? request.body.map(String) : [];
    hooks.beforeCommand?.(command);
    const [name = '', key = '', ...args] = command;

    switch (name.toUpperCase()) {
      case 'EVAL': {
        // Only the store's compare-and-set script is understood
        if (key !== COMPARE_AND_SET_SCRIPT) return jsonResponse({ error: 'ERR unknown script' });
        const [, target = '', expected, value = '', ttl] = args;
        if (live(target)?.value !== expected) return jsonResponse({ result: 0 });
        strings.set(target, { value, expiresAt: now() + Number(ttl) * 1000 });
        return jsonResponse({ result: 1 });
      }
      case 'SET': {
        const exIndex = args.findIndex(a => a.toUpperCase() === 'EX');
        const ttl = exIndex >= 0 ? Number(args[exIndex + 1]) : null;
        strings.set(key, { value: args[0] ?? '', expiresAt: ttl === null ? null : now() + ttl * 1000 });
        return jsonResponse({ result: 'OK' });
      }
      case 'GET':
        return jsonResponse({ result: live(key)?.value ?? null });
      case 'DEL':
        return jsonResponse({ result: live(key) && strings.delete(key) ? 1 : 0 });
      case 'LPUSH': {
        const list = lists.get(key) ?? [];
        list.unshift(...args);
        lists.set(key, list);
        return jsonResponse({ result: list.length });
      }
      case 'RPOP':
        return jsonResponse({ result: lists.get(key)?.pop() ?? null });
      case 'LREM': {
        const list = lists.get(key) ?? [];
        const kept = list.filter(item => item !== args[1]);
        lists.set(key, kept);
        return jsonResponse({ result: list.length - kept.length });
      }
      case 'LLEN':
        return jsonResponse({ result: lists.get(key)?.length ?? 0 });
      default:
        return jsonResponse({ error: `ERR unknown command '${name}'` });
    }
  });

  return { ...fake, strings, lists, hooks };
}
