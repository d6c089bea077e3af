import { SqModeError, SqModeErrorCode } from '../../../src/shared/errors.js';

describe('SqModeError', () => {
  it('creates error with code and message', () => {
    const err = new SqModeError(SqModeErrorCode.SPAWN_FAILED, 'Could not start sq: ENOENT');
    expect(err.code).toBe(SqModeErrorCode.SPAWN_FAILED);
    expect(err.message).toBe('Could not start sq: ENOENT');
    expect(err.name).toBe('SqModeError');
    expect(err instanceof Error).toBe(true);
  });

  it('includes optional context', () => {
    const err = new SqModeError(SqModeErrorCode.INVALID_RANGE, 'bad range', { start: 4, end: 2 });
    expect(err.context).toEqual({ start: 4, end: 2 });
  });
});
