import { resolveInput } from '../../../src/pipeline/input.js';
import { HeadlessHost } from '../../../src/host/headless.js';
import { SqModeErrorCode } from '../../../src/shared/errors.js';

async function withDocument<T>(text: string, fn: (host: HeadlessHost) => T): Promise<T> {
  const host = new HeadlessHost(80);
  const outcome = await host.session({ text }, async () => fn(host));
  return outcome.value;
}

describe('resolveInput', () => {
  it('returns the literal text and ignores the document', async () => {
    const input = await withDocument('document', host => resolveInput(host, { kind: 'literal', text: '' }));
    expect(input).toBe('');
  });

  it('returns the whole document', async () => {
    const input = await withDocument('-----BEGIN PGP PUBLIC KEY BLOCK-----\n', host =>
      resolveInput(host, { kind: 'document' }));
    expect(input).toBe('-----BEGIN PGP PUBLIC KEY BLOCK-----\n');
  });

  it('slices the document for a range', async () => {
    const input = await withDocument('0123456789', host => resolveInput(host, { kind: 'range', start: 3, end: 7 }));
    expect(input).toBe('3456');
  });

  it('accepts an empty range and a range covering the whole document', async () => {
    const inputs = await withDocument('abc', host => [
      resolveInput(host, { kind: 'range', start: 1, end: 1 }),
      resolveInput(host, { kind: 'range', start: 0, end: 3 }),
    ]);
    expect(inputs).toEqual(['', 'abc']);
  });

  const invalid: Array<[string, number, number]> = [
    ['decreasing', 5, 2],
    ['negative', -1, 2],
    ['past the end', 0, 11],
    ['fractional', 0.5, 2],
  ];

  it.each(invalid)('rejects a %s range', async (_label, start, end) => {
    await expect(withDocument('0123456789', host => resolveInput(host, { kind: 'range', start, end })))
      .rejects.toMatchObject({ code: SqModeErrorCode.INVALID_RANGE });
  });
});
