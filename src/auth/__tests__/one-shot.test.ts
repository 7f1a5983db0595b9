import { describe, it, expect } from 'vitest';
import { createOneShot } from '../one-shot.js';

describe('createOneShot', () => {
  it('resolves with the first value and ignores later ones', async () => {
    const shot = createOneShot<string>();

    expect(shot.settled).toBe(false);
    expect(shot.resolve('first')).toBe(true);
    expect(shot.resolve('second')).toBe(false);
    expect(shot.reject(new Error('late'))).toBe(false);
    expect(shot.settled).toBe(true);
    expect(shot.rejected).toBe(false);

    await expect(shot.promise).resolves.toBe('first');
  });

  it('delivers a rejection that happened before anyone waited', async () => {
    const shot = createOneShot<string>();
    expect(shot.reject(new Error('denied'))).toBe(true);
    expect(shot.resolve('code')).toBe(false);
    expect(shot.rejected).toBe(true);

    await expect(shot.promise).rejects.toThrow('denied');
  });
});
