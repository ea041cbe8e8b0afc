import { describe, expect, it } from 'vitest';

import { JobWaiter } from './job-waiter.js';

describe('JobWaiter', () => {
  it('resolves immediately when nothing is outstanding', async () => {
    const waiter = new JobWaiter();

    await expect(waiter.wait()).resolves.toBeUndefined();
    expect(waiter.size).toBe(0);
  });

  it('resolves every waiter once the last unit is released', async () => {
    const waiter = new JobWaiter();
    const settled: string[] = [];

    waiter.add();
    waiter.add();
    const first = waiter.wait().then(() => settled.push('first'));
    const second = waiter.wait().then(() => settled.push('second'));

    waiter.done();
    await Promise.resolve();
    expect(settled).toEqual([]);
    expect(waiter.size).toBe(1);

    waiter.done();
    await Promise.all([first, second]);
    expect(settled).toEqual(['first', 'second']);
    expect(waiter.size).toBe(0);
  });

  it('refuses to release more units than were added', () => {
    const waiter = new JobWaiter();

    expect(() => waiter.done()).toThrow('JobWaiter.done() called without a matching add().');
  });
});
