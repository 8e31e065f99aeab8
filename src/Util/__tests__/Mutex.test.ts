import { describe, expect, it } from 'vitest';
import { Mutex } from '../Mutex';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('Mutex', () => {
	it('runs tasks one at a time in call order', async () => {
		const mutex = new Mutex();
		const events: string[] = [];

		const run = (name: string) =>
			mutex.withLock(async () => {
				events.push(`${name}:start`);
				await tick();
				events.push(`${name}:end`);
				return name;
			});

		const results = await Promise.all([run('a'), run('b'), run('c')]);

		expect(results).toEqual(['a', 'b', 'c']);
		expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
	});

	it('releases the lock when a task throws', async () => {
		const mutex = new Mutex();

		await expect(
			mutex.withLock(() => {
				throw new Error('boom');
			})
		).rejects.toThrow('boom');

		await expect(mutex.withLock(() => 'next')).resolves.toBe('next');
	});

	it('counts waiting callers', async () => {
		const mutex = new Mutex();
		await mutex.acquire();

		const waiting = mutex.acquire();
		expect(mutex.pending).toBe(1);

		mutex.release();
		await waiting;
		expect(mutex.pending).toBe(0);
		mutex.release();
	});
});
