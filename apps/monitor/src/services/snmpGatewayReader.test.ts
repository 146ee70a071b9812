import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTestDevice } from '../__tests__/helpers';
import { TransportError } from './monitorErrors';
import { SnmpGatewayReader } from './snmpGatewayReader';

const device = createTestDevice({ interfaces: [] });
const now = () => new Date('2026-03-10T08:00:00.000Z');

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('SnmpGatewayReader', () => {
  const reader = new SnmpGatewayReader({ baseUrl: 'http://gateway.test:8161/', token: 'test-secret', now });

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('posts the OID plan and parses the answer', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      results: [
        { oid: '1.3.6.1.4.1.2021.11.10.0', value: 7 },
        { oid: '1.3.6.1.2.1.25.2.3.1.6.65536', value: 50 },
        { oid: '1.3.6.1.2.1.25.2.3.1.5.65536', value: 200 }
      ]
    }));
    vi.stubGlobal('fetch', fetchMock);

    const reading = await reader.fetch(device, new AbortController().signal);

    expect(reading).toEqual({
      device: 'core-router',
      timestamp: '2026-03-10T08:00:00.000Z',
      cpuPercent: 7,
      ram: { usedBytes: 50, totalBytes: 200 },
      interfaces: {},
      missing: []
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://gateway.test:8161/snmp/get');
    expect(init.headers['Authorization']).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual({
      target: '10.0.0.1',
      port: 161,
      version: 'v2c',
      community: 'public',
      oids: ['1.3.6.1.4.1.2021.11.10.0', '1.3.6.1.2.1.25.2.3.1.6.65536', '1.3.6.1.2.1.25.2.3.1.5.65536']
    });
  });

  it('treats a non-2xx answer as a transport failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('gateway overloaded', { status: 503 })));

    const attempt = reader.fetch(device, new AbortController().signal);

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow('Device core-router unreachable: gateway returned HTTP 503: gateway overloaded');
  });

  it('fails when no OID answered', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({
      results: [
        { oid: '1.3.6.1.4.1.2021.11.10.0', value: null, error: 'timeout' },
        { oid: '1.3.6.1.2.1.25.2.3.1.6.65536', value: null, error: 'timeout' }
      ]
    })));

    await expect(reader.fetch(device, new AbortController().signal)).rejects.toThrow(
      'Device core-router unreachable: no OIDs answered'
    );
  });

  it('rejects a response of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ values: [] })));

    await expect(reader.fetch(device, new AbortController().signal)).rejects.toThrow(/unexpected gateway response/);
  });

  it('reports an aborted request', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new DOMException('This operation was aborted', 'AbortError')));

    await expect(reader.fetch(device, new AbortController().signal)).rejects.toThrow(
      'Device core-router unreachable: request aborted'
    );
  });
});
