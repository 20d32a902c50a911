import { describe, it, expect, vi, afterEach } from 'vitest';
import { clientAddress, formatAccessLine } from '../src/access-log.js';
import { accessLogger } from '../src/logger.js';
import { ProviderRegistry, type RegisteredProvider } from '../src/providers/index.js';
import { createApp } from '../src/server.js';
import { InMemoryProvider } from './helpers.js';

class UnavailableRegistry extends ProviderRegistry {
  resolve(name: string): RegisteredProvider | undefined {
    throw new Error(`registry unavailable for ${name}`);
  }
}

describe('clientAddress', () => {
  it('takes the first X-Forwarded-For entry', () => {
    expect(clientAddress('203.0.113.7, 10.0.0.1', '10.0.0.2')).toBe('203.0.113.7');
  });

  it('falls back to X-Real-IP, then a dash', () => {
    expect(clientAddress(undefined, '10.0.0.2')).toBe('10.0.0.2');
    expect(clientAddress(undefined, undefined)).toBe('-');
  });
});

describe('formatAccessLine', () => {
  it('renders method, path, agent, client, status, length and duration', () => {
    const line = formatAccessLine({
      method: 'GET',
      path: '/ddns/cloudflare/home.example.com/1.2.3.4?src=router',
      userAgent: 'curl/8.0',
      forwardedFor: '203.0.113.7',
      status: 200,
      contentLength: '97',
      durationMs: 12.3456,
    });

    expect(line).toBe(
      'GET /ddns/cloudflare/home.example.com/1.2.3.4?src=router "curl/8.0" 203.0.113.7 200 97 12.346ms'
    );
  });

  it('uses dashes for missing values', () => {
    const line = formatAccessLine({
      method: 'GET',
      path: '/health',
      status: 200,
      contentLength: null,
      durationMs: 0.5,
    });

    expect(line).toBe('GET /health "-" - 200 - 0.500ms');
  });
});

describe('accessLog middleware', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function loggedLines(spy: { mock: { calls: unknown[][] } }): string[] {
    return spy.mock.calls.map((call) => String(call[0]));
  }

  it('logs one line per DDNS request with the first forwarded address', async () => {
    const info = vi.spyOn(accessLogger, 'info');
    const app = createApp(
      new ProviderRegistry([
        { name: 'cloudflare', kind: 'cloudflare', zoneId: 'zone-1', client: new InMemoryProvider() },
      ])
    );

    const res = await app.request('/ddns/cloudflare/home.example.com/1.2.3.4?src=router', {
      headers: { 'x-forwarded-for': '203.0.113.7, 10.0.0.1', 'user-agent': 'router/1.0' },
    });

    expect(res.status).toBe(200);
    const lines = loggedLines(info);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^GET \/ddns\/cloudflare\/home\.example\.com\/1\.2\.3\.4\?src=router "router\/1\.0" 203\.0\.113\.7 200 \S+ \d+\.\d{3}ms$/
    );
  });

  it('still logs when the handler throws', async () => {
    const info = vi.spyOn(accessLogger, 'info');
    const app = createApp(new UnavailableRegistry([]));

    const res = await app.request('/ddns/cloudflare/home.example.com/1.2.3.4', {
      headers: { 'x-real-ip': '10.0.0.2' },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'Internal server error' });
    const lines = loggedLines(info);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^GET \/ddns\/cloudflare\/home\.example\.com\/1\.2\.3\.4 "-" 10\.0\.0\.2 500 \S+ \d+\.\d{3}ms$/
    );
  });

  it('logs unmatched routes with their 404', async () => {
    const info = vi.spyOn(accessLogger, 'info');
    const app = createApp(new ProviderRegistry([]));

    await app.request('/nowhere');

    expect(loggedLines(info)).toEqual([expect.stringMatching(/^GET \/nowhere "-" - 404 /)]);
  });
});
