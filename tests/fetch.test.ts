import { FetchError } from '../src/errors';
import { entryUrl, fetchEntryText, fetchText, normalizeEntryId } from '../src/fetch/index';
import type { FetchOptions } from '../src/fetch/index';
import type { Logger } from '../src/utils/logger';

type Reply = { status: number; body?: string };

function scripted(replies: Reply[]) {
  const calls: string[] = [];
  const sleeps: number[] = [];
  const warnings: string[] = [];
  const logger: Logger = {
    debug: jest.fn(),
    info: jest.fn(),
    success: jest.fn(),
    warn: (message: string) => {
      warnings.push(message);
    },
    error: jest.fn(),
  };
  const options: FetchOptions = {
    logger,
    sleep: async ms => {
      sleeps.push(ms);
    },
    fetchImpl: async url => {
      calls.push(url);
      const reply = replies[Math.min(calls.length, replies.length) - 1];
      return { ok: reply.status === 200, status: reply.status, text: async () => reply.body ?? '' };
    },
  };
  return { calls, sleeps, warnings, options };
}

describe('remote retrieval', () => {
  it('builds entry URLs from accessions', () => {
    expect(normalizeEntryId('BMR15000')).toBe('15000');
    expect(normalizeEntryId(15000)).toBe('15000');
    expect(entryUrl('15000')).toBe('https://api.bmrb.io/v2/entry/15000?format=rawnmrstar');
    expect(entryUrl(' bmr42 ', 'http://localhost:8000/v2/')).toBe(
      'http://localhost:8000/v2/entry/42?format=rawnmrstar'
    );
  });

  it('returns the body of a successful response', async () => {
    const { calls, options } = scripted([{ status: 200, body: 'data_1' }]);
    await expect(fetchText('http://example.test/a', options)).resolves.toBe('data_1');
    expect(calls).toEqual(['http://example.test/a']);
  });

  it('waits and retries when rate limited', async () => {
    const { calls, sleeps, warnings, options } = scripted([{ status: 429 }, { status: 200, body: 'ok' }]);
    await expect(fetchText('http://example.test/a', options)).resolves.toBe('ok');
    expect(calls).toHaveLength(2);
    expect(sleeps).toEqual([5000]);
    expect(warnings).toEqual(['We were rate limited. Sleeping for 5 seconds.']);
  });

  it('gives up once the back-off grows too long', async () => {
    const { sleeps, options } = scripted([{ status: 403 }]);
    const result = fetchText('http://example.test/a', options);
    await expect(result).rejects.toThrow('Continued to receive 403 after multiple wait times.');
    expect(sleeps).toEqual([5000, 25000]);
  });

  it('reports other failures without retrying', async () => {
    const { calls, options } = scripted([{ status: 500 }]);
    await expect(fetchText('http://example.test/a', options)).rejects.toThrow('Request failed with status 500.');
    expect(calls).toHaveLength(1);
  });

  it('explains a missing entry', async () => {
    const { options } = scripted([{ status: 404 }]);
    const error = await fetchEntryText('99999', options).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    if (error instanceof FetchError) {
      expect(error.message).toBe('Entry 99999 does not exist in the public database.');
      expect(error.status).toBe(404);
      expect(error.url).toBe('https://api.bmrb.io/v2/entry/99999?format=rawnmrstar');
    }
  });
});
