import express from 'express';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { AppError } from '../src/lib/errors';
import { issueSessionToken, type Principal } from '../src/lib/sessionToken';
import { AccessGate } from '../src/middleware/auth';
import { startServer, type TestServer } from './support/http';

const SECRET = 'test-secret';
const user: Principal = { id: '65a1f0c2e4b0a1b2c3d4e5f6', email: 'a@x.com', role: 'user' };
const admin: Principal = { id: '65a1f0c2e4b0a1b2c3d4e5f7', email: 'root@x.com', role: 'admin' };

function failure(fn: () => unknown) {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return { status: err.status, code: err.code };
    throw err;
  }
  throw new Error('expected the gate to refuse');
}

describe('AccessGate.check', () => {
  const gate = new AccessGate(SECRET);
  const bearer = (p: Principal) => `Bearer ${issueSessionToken(p, SECRET)}`;

  it('refuses a missing or empty header', () => {
    expect(failure(() => gate.check(undefined))).toEqual({ status: 401, code: 'unauthenticated' });
    expect(failure(() => gate.check(''))).toEqual({ status: 401, code: 'unauthenticated' });
  });

  it('refuses other schemes and bare tokens', () => {
    const token = issueSessionToken(user, SECRET);
    expect(failure(() => gate.check(`Basic ${token}`))).toEqual({ status: 401, code: 'unauthenticated' });
    expect(failure(() => gate.check(token))).toEqual({ status: 401, code: 'unauthenticated' });
    expect(failure(() => gate.check('Bearer '))).toEqual({ status: 401, code: 'unauthenticated' });
  });

  it('refuses an expired token, even on an admin route', () => {
    const token = issueSessionToken(admin, SECRET, { now: new Date(Date.now() - 25 * 60 * 60 * 1000) });
    expect(failure(() => gate.check(`Bearer ${token}`, { role: 'admin' }))).toEqual({
      status: 401,
      code: 'unauthenticated',
    });
  });

  it('accepts the scheme in any case', () => {
    const token = issueSessionToken(user, SECRET);
    expect(gate.check(`bearer ${token}`)).toEqual(user);
    expect(gate.check(`BEARER ${token}`)).toEqual(user);
  });

  it('checks the token before the role', () => {
    const forged = issueSessionToken(admin, 'another-secret');
    expect(failure(() => gate.check(`Bearer ${forged}`, { role: 'admin' }))).toEqual({
      status: 401,
      code: 'unauthenticated',
    });
  });

  it('forbids a user token on an admin route', () => {
    expect(failure(() => gate.check(bearer(user), { role: 'admin' }))).toEqual({ status: 403, code: 'forbidden' });
  });

  it('returns the principal for a valid token', () => {
    expect(gate.check(bearer(user))).toEqual(user);
    expect(gate.check(bearer(admin), { role: 'admin' })).toEqual(admin);
  });

  it('uses the injected clock', () => {
    const issuedAt = new Date('2026-03-01T12:00:00Z');
    const token = issueSessionToken(user, SECRET, { now: issuedAt });
    const later = new AccessGate(SECRET, () => new Date(issuedAt.getTime() + 24 * 60 * 60 * 1000 + 1000));
    expect(failure(() => later.check(`Bearer ${token}`))).toEqual({ status: 401, code: 'unauthenticated' });
  });
});

describe('AccessGate.protect', () => {
  const gate = new AccessGate(SECRET);
  const handler = vi.fn((_req: express.Request, res: express.Response, principal: Principal) =>
    res.json({ id: principal.id, role: principal.role })
  );
  let server: TestServer;

  beforeAll(async () => {
    const app = express();
    app.get('/me', gate.protect(handler));
    app.get('/admin', gate.protect(handler, { role: 'admin' }));
    server = await startServer(app);
  });

  afterAll(() => server.close());

  it('does not call the handler without a token', async () => {
    handler.mockClear();
    const res = await server.request('GET', '/me');
    expect(res).toEqual({ status: 401, body: { error: 'unauthenticated' } });
    expect(handler).not.toHaveBeenCalled();
  });

  it('does not call the handler for a user on an admin route', async () => {
    handler.mockClear();
    const res = await server.request('GET', '/admin', { token: issueSessionToken(user, SECRET) });
    expect(res).toEqual({ status: 403, body: { error: 'forbidden' } });
    expect(handler).not.toHaveBeenCalled();
  });

  it('passes the verified principal to the handler', async () => {
    handler.mockClear();
    const res = await server.request('GET', '/admin', { token: issueSessionToken(admin, SECRET) });
    expect(res).toEqual({ status: 200, body: { id: admin.id, role: 'admin' } });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][2]).toEqual(admin);
  });
});
