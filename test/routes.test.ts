import fs from 'fs';
import os from 'os';
import path from 'path';
import { GET as getStatus } from '../app/api/cookie/status/route';
import { POST as postValidate } from '../app/api/cookie/validate/route';
import { POST as postDiff } from '../app/api/cookie/diff/route';
import { POST as postUpdate } from '../app/api/cookie/update/route';

const COMPLETE = 'unb=123; _m_h5_tk=tok; cookie2=abc; cna=x; sgcookie=y';

let dir: string;
let envPath: string;
let previousStorePath: string | undefined;

function jsonRequest(route: string, body: unknown): Request {
  return new Request(`http://localhost/api/cookie/${route}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json', 'x-request-id': 'req-test' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cookie-routes-'));
  envPath = path.join(dir, '.env');
  previousStorePath = process.env.COOKIE_STORE_PATH;
  process.env.COOKIE_STORE_PATH = envPath;
});

afterEach(() => {
  if (previousStorePath === undefined) {
    delete process.env.COOKIE_STORE_PATH;
  } else {
    process.env.COOKIE_STORE_PATH = previousStorePath;
  }
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('GET /api/cookie/status', () => {
  it('returns the report for the stored cookie', async () => {
    fs.writeFileSync(envPath, `COOKIES_STR=${COMPLETE}\n`);
    const response = await getStatus(
      new Request('http://localhost/api/cookie/status', { headers: { 'x-request-id': 'req-status' } }),
    );
    expect(response.status).toBe(200);
    expect(response.headers.get('X-Request-Id')).toBe('req-status');
    const payload = await response.json();
    expect(payload.ok).toBe(true);
    expect(payload.location).toBe(envPath);
    expect(payload.report.isComplete).toBe(true);
    expect(payload.report.isFresh).toBe(false);
    expect(payload.report.identity).toEqual({ field: 'unb', value: '123' });
  });

  it('returns 404 when the store has no cookie entry', async () => {
    fs.writeFileSync(envPath, 'BOT_NAME=test\n');
    const response = await getStatus(new Request('http://localhost/api/cookie/status'));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ ok: false, error: 'No COOKIES_STR entry in store', location: envPath });
  });

  it('returns 500 when the store file is missing', async () => {
    const response = await getStatus(new Request('http://localhost/api/cookie/status'));
    expect(response.status).toBe(500);
    const payload = await response.json();
    expect(payload.ok).toBe(false);
    expect(payload.error.startsWith(`Cookie store read failed for ${envPath}:`)).toBe(true);
  });
});

describe('POST /api/cookie/validate', () => {
  it('evaluates the posted cookie', async () => {
    const response = await postValidate(jsonRequest('validate', { cookie: 'unb=123' }));
    expect(response.status).toBe(200);
    const payload = await response.json();
    expect(payload.report.missingRequired).toEqual(['_m_h5_tk', 'cookie2', 'cna', 'sgcookie']);
  });

  it('rejects a body without a cookie', async () => {
    const response = await postValidate(jsonRequest('validate', { cookie: '  ' }));
    expect(response.status).toBe(400);
    const payload = await response.json();
    expect(payload.error.fieldErrors.cookie).toEqual(['cookie string is required']);
  });

  it('rejects a body that is not JSON', async () => {
    const response = await postValidate(jsonRequest('validate', 'unb=123'));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ ok: false, error: 'request body must be JSON' });
  });
});

describe('POST /api/cookie/diff', () => {
  it('returns the field changes against the store', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=a=1; b=2\n');
    const response = await postDiff(jsonRequest('diff', { cookie: 'a=1; c=3' }));
    expect(response.status).toBe(200);
    const { diff } = await response.json();
    expect(diff).toMatchObject({ unchanged: false, added: ['c'], removed: ['b'], changed: [] });
  });
});

describe('POST /api/cookie/update', () => {
  it('writes once and then reports nothing written', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const first = await postUpdate(jsonRequest('update', { cookie: COMPLETE }));
    expect(first.status).toBe(200);
    const firstPayload = await first.json();
    expect(firstPayload.written).toBe(true);
    expect(typeof firstPayload.backupPath).toBe('string');
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=_m_h5_tk=tok; cna=x; cookie2=abc; sgcookie=y; unb=123\n');

    const second = await postUpdate(jsonRequest('update', { cookie: COMPLETE }));
    const secondPayload = await second.json();
    expect(secondPayload.written).toBe(false);
    expect(secondPayload.backupPath).toBeUndefined();
  });

  it('returns 422 for an incomplete cookie unless forced', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const refused = await postUpdate(jsonRequest('update', { cookie: 'unb=123' }));
    expect(refused.status).toBe(422);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=old\n');

    const forced = await postUpdate(jsonRequest('update', { cookie: 'unb=123', force: true, backup: false }));
    expect(forced.status).toBe(200);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=123\n');
  });

  it('returns 422 for a value spanning several lines', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    const response = await postUpdate(jsonRequest('update', { cookie: 'unb=1\ncna=2; cookie2=c', force: true }));
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      ok: false,
      error: 'Cannot store COOKIES_STR: value must fit on a single line',
    });
    expect(fs.readdirSync(dir)).toEqual(['.env']);
  });

  it('returns 409 while the store is locked', async () => {
    fs.writeFileSync(envPath, 'COOKIES_STR=unb=old\n');
    fs.writeFileSync(path.join(dir, '.cookie-console.lock'), 'locked-by=1\n');
    const response = await postUpdate(jsonRequest('update', { cookie: COMPLETE, backup: false }));
    expect(response.status).toBe(409);
    expect(fs.readFileSync(envPath, 'utf8')).toBe('COOKIES_STR=unb=old\n');
  });
});
