import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryMonitorStore } from './__tests__/helpers';
import { parseDeviceRegistry } from './services/deviceRegistry';
import { PersistenceError } from './services/monitorErrors';
import { createQueryApp } from './app';

const registry = parseDeviceRegistry([{ name: 'core-router', address: '10.0.0.1' }]);
const now = () => new Date('2026-03-10T08:00:00.000Z');

describe('createQueryApp', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers the health check', async () => {
    const app = createQueryApp({ registry, store: new MemoryMonitorStore(), timeZone: 'UTC', now, requestLogging: false });

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', timestamp: '2026-03-10T08:00:00.000Z', devices: 1 });
  });

  it('returns a JSON 404 for unknown paths', async () => {
    const app = createQueryApp({ registry, store: new MemoryMonitorStore(), timeZone: 'UTC', requestLogging: false });

    const res = await app.request('/bandwidth');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not Found', path: '/bandwidth' });
  });

  it('turns a storage failure into a 500 without leaking the path', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const store = new MemoryMonitorStore();
    store.loadDeviceState = vi.fn().mockRejectedValue(new PersistenceError('load device state', '/data/state/devices/core-router.json'));
    const app = createQueryApp({ registry, store, timeZone: 'UTC', requestLogging: false });

    const res = await app.request('/devices/core-router/status');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal Server Error' });
  });
});
