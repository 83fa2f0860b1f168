import { DeadlineExceededError, withDeadline } from './deadline';

describe('withDeadline', () => {
  it('returns the result of work that finishes in time', async () => {
    await expect(withDeadline(1_000, async () => 'done')).resolves.toBe('done');
  });

  it('passes work errors through', async () => {
    await expect(
      withDeadline(1_000, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });

  it('rejects and aborts the signal at the deadline', async () => {
    let seen: AbortSignal | undefined;

    await expect(
      withDeadline(10, (signal) => {
        seen = signal;
        return new Promise<never>(() => undefined);
      }),
    ).rejects.toEqual(new DeadlineExceededError(10));

    expect(seen?.aborted).toBe(true);
  });
});
