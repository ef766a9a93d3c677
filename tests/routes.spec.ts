import { beforeEach, describe, expect, it, vi } from 'vitest';

beforeEach(() => {
  vi.resetModules();
  process.env.HMAC_SECRET = 'test-secret';
  process.env.HMAC_MAX_MESSAGE_BYTES = '16';
  process.env.LOG_LEVEL = 'silent';
});

async function makeApp() {
  const { buildServer } = await import('../src/index.js');
  return buildServer();
}

describe('health', () => {
  it('answers liveness and readiness probes', async () => {
    const app = await makeApp();
    expect((await app.inject({ method: 'GET', url: '/healthz' })).json()).toEqual({ status: 'ok' });
    expect((await app.inject({ method: 'GET', url: '/readyz' })).json()).toEqual({ status: 'ready' });
  });
});

describe('POST /hmac/sign', () => {
  it('signs a utf8 message with the configured secret', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'POST', url: '/hmac/sign', payload: { message: 'hello' } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      algorithm: 'hmac-sha256',
      signature: 'bcc889a40667cab715e1dc22ad280692cf4bf1c3a280eeeca60d8dbcd8e4b993',
      output: 'hex',
    });
  });

  it('decodes hex messages and encodes base64 output', async () => {
    const app = await makeApp();
    const hex = await app.inject({
      method: 'POST',
      url: '/hmac/sign',
      payload: { message: 'deadbeef', encoding: 'hex' },
    });
    expect(hex.json().signature).toBe('39046bec983632e7524cd848cbb3ea04c70fb10064af3c76807f101a3a72bae3');

    const b64 = await app.inject({
      method: 'POST',
      url: '/hmac/sign',
      payload: { message: 'hello', output: 'base64' },
    });
    expect(b64.json()).toEqual({
      algorithm: 'hmac-sha256',
      signature: 'vMiJpAZnyrcV4dwirSgGks9L8cOigO7spg2NvNjkuZM=',
      output: 'base64',
    });
  });

  it('returns 413 when the message exceeds the configured capacity', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'POST', url: '/hmac/sign', payload: { message: 'x'.repeat(17) } });
    expect(res.statusCode).toBe(413);
    expect(res.json()).toEqual({ status: 'error', message: 'length 17 exceeds capacity 16' });
  });

  it('accepts a message of exactly the configured capacity', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'POST', url: '/hmac/sign', payload: { message: 'x'.repeat(16) } });
    expect(res.statusCode).toBe(200);
  });

  it('accepts a capacity-sized message whose JSON escapes outgrow the hex allowance', async () => {
    process.env.HMAC_MAX_MESSAGE_BYTES = '1024';
    const app = await makeApp();
    const payload = { message: '\u0001'.repeat(1024) };
    expect(JSON.stringify(payload).length).toBeGreaterThan(1024 * 2 + 4096);

    const res = await app.inject({ method: 'POST', url: '/hmac/sign', payload });
    expect(res.statusCode).toBe(200);
    expect(res.json().signature).toBe('17d4ff69a8bc568fc4a61d23815c3b60e6821ef5825f4d5a4cd778ab0690f765');

    const over = await app.inject({
      method: 'POST',
      url: '/hmac/sign',
      payload: { message: '\u0001'.repeat(1025) },
    });
    expect(over.statusCode).toBe(413);
    expect(over.json()).toEqual({ status: 'error', message: 'length 1025 exceeds capacity 1024' });
  });

  it('returns 400 for malformed hex', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/hmac/sign',
      payload: { message: 'abc', encoding: 'hex' },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ status: 'error', message: 'value is not valid hex' });
  });

  it('returns 400 when the body fails schema validation', async () => {
    const app = await makeApp();
    const missing = await app.inject({ method: 'POST', url: '/hmac/sign', payload: {} });
    expect(missing.statusCode).toBe(400);
    const badEncoding = await app.inject({
      method: 'POST',
      url: '/hmac/sign',
      payload: { message: 'hello', encoding: 'latin1' },
    });
    expect(badEncoding.statusCode).toBe(400);
  });
});

describe('POST /hmac/verify', () => {
  it('accepts a valid signature and rejects a tampered one', async () => {
    const app = await makeApp();
    const ok = await app.inject({
      method: 'POST',
      url: '/hmac/verify',
      payload: {
        message: 'hello',
        signature: 'bcc889a40667cab715e1dc22ad280692cf4bf1c3a280eeeca60d8dbcd8e4b993',
      },
    });
    expect(ok.json()).toEqual({ valid: true });

    const tampered = await app.inject({
      method: 'POST',
      url: '/hmac/verify',
      payload: {
        message: 'hellp',
        signature: 'bcc889a40667cab715e1dc22ad280692cf4bf1c3a280eeeca60d8dbcd8e4b993',
      },
    });
    expect(tampered.statusCode).toBe(200);
    expect(tampered.json()).toEqual({ valid: false });
  });

  it('treats an undecodable signature as invalid', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/hmac/verify',
      payload: { message: 'hello', signature: 'not-base64!', output: 'base64' },
    });
    expect(res.json()).toEqual({ valid: false });
  });
});
