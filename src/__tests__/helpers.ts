import { createApp, createServices } from '../app';
import type { TaskEntity } from '../Entity/TaskEntity';
import type { TaskStatus } from '../Entity/TaskStatus';
import type { LedGroupInfo, StatusSink } from '../Hardware/StatusSink';
import type { JsonStorage } from '../Storage/JsonStorage';
import { MemoryJsonStorage } from '../Storage/MemoryJsonStorage';

export const TEST_TOKEN = 'test-secret';

export const FIXED_NOW = new Date('2026-03-01T09:00:00.000Z');

// 呼ばれた内容を記録するだけの LED 出力
export class RecordingSink implements StatusSink {
	readonly enabled = true;
	readonly shown: Array<{ taskIndex: number; status: TaskStatus }> = [];
	readonly synced: TaskEntity[][] = [];
	fail = false;

	show(taskIndex: number, status: TaskStatus): Promise<void> {
		this.shown.push({ taskIndex, status });
		return this.fail ? Promise.reject(new Error('led offline')) : Promise.resolve();
	}

	sync(tasks: readonly TaskEntity[]): Promise<void> {
		this.synced.push([...tasks]);
		return this.fail ? Promise.reject(new Error('led offline')) : Promise.resolve();
	}

	describe(): LedGroupInfo[] {
		return [];
	}

	close(): Promise<void> {
		return Promise.resolve();
	}
}

export function buildApp(options?: { nfcPublic?: boolean; storage?: JsonStorage; sink?: StatusSink }) {
	const storage = options?.storage ?? new MemoryJsonStorage();
	const sink = options?.sink ?? new RecordingSink();
	const services = createServices({
		storage,
		sink,
		auth: { authToken: TEST_TOKEN, nfcPublic: options?.nfcPublic ?? false },
		now: () => FIXED_NOW,
	});
	return { app: createApp(services), services, storage, sink };
}

export const authHeaders = {
	Authorization: `Bearer ${TEST_TOKEN}`,
	'Content-Type': 'application/json',
};

export const jsonRequest = (method: string, body?: unknown): RequestInit => ({
	method,
	headers: authHeaders,
	body: body === undefined ? undefined : JSON.stringify(body),
});
