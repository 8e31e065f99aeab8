import { describe, expect, it } from 'vitest';
import { MAPPINGS_FILE } from '../../Store/MappingStore';
import { SCAN_LOG_FILE } from '../../Store/ScanLog';
import { TASKS_FILE } from '../../Store/TaskStore';
import { authHeaders, buildApp, jsonRequest } from '../../__tests__/helpers';

const scan = (body: unknown) => jsonRequest('POST', body);

describe('NFC routes', () => {
	describe('auth', () => {
		it('rejects a missing token', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/scan', {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify({ tag_id: 'T1', task_title: 'Water Plants' }),
			});

			expect(res.status).toBe(401);
			expect(await res.json()).toEqual({ error: 'unauthorized', message: 'Missing or invalid bearer token' });
		});

		it('rejects a wrong token', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/mappings', { headers: { Authorization: 'Bearer wrong' } });

			expect(res.status).toBe(401);
		});

		it('rejects tokens that only share a prefix with the real one', async () => {
			const { app } = buildApp();

			for (const token of ['test-secre', 'test-secret-extra']) {
				const res = await app.request('/api/nfc/mappings', { headers: { Authorization: `Bearer ${token}` } });
				expect(res.status).toBe(401);
			}
		});

		it('allows scans without a token in public mode', async () => {
			const { app } = buildApp({ nfcPublic: true });

			const res = await app.request('/api/nfc/scan', {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify({ tag_id: 'T1', task_title: 'Water Plants' }),
			});

			expect(res.status).toBe(201);
		});
	});

	describe('POST /api/nfc/scan', () => {
		it('creates the task and then cycles its status', async () => {
			const { app } = buildApp();

			const first = await app.request('/api/nfc/scan', scan({ tag_id: 'T1', task_title: 'Water Plants' }));
			expect(first.status).toBe(201);
			expect(await first.json()).toEqual({
				status: 'task_created_and_mapped',
				tag_id: 'T1',
				task_title: 'Water Plants',
				task_index: 1,
				new_status: 0,
				status_name: 'Not Started',
			});

			const statuses: number[] = [];
			const bodies: unknown[] = [];
			for (let i = 0; i < 3; i++) {
				const res = await app.request('/api/nfc/scan', scan({ tag_id: 'T1' }));
				statuses.push(res.status);
				bodies.push(await res.json());
			}

			expect(statuses).toEqual([200, 200, 200]);
			expect(bodies).toEqual([
				{ status: 'task_incremented', tag_id: 'T1', task_title: 'Water Plants', task_index: 1, new_status: 1, status_name: 'In Progress' },
				{ status: 'task_incremented', tag_id: 'T1', task_title: 'Water Plants', task_index: 1, new_status: 2, status_name: 'Completed' },
				{ status: 'task_incremented', tag_id: 'T1', task_title: 'Water Plants', task_index: 1, new_status: 0, status_name: 'Not Started' },
			]);
		});

		it('rejects an unmapped tag without a title and writes nothing', async () => {
			const { app, storage } = buildApp();

			const res = await app.request('/api/nfc/scan', scan({ tag_id: 'T9' }));

			expect(res.status).toBe(400);
			expect(await res.json()).toEqual({
				error: 'unmapped_tag',
				message: 'Tag T9 is not mapped to a task. Provide task_title to map it.',
			});
			await expect(storage.read(TASKS_FILE)).resolves.toBeUndefined();
			await expect(storage.read(MAPPINGS_FILE)).resolves.toBeUndefined();
			await expect(storage.read(SCAN_LOG_FILE)).resolves.toBeUndefined();
		});

		it('requires a tag id', async () => {
			const { app } = buildApp();

			for (const body of [{ task_title: 'Water Plants' }, { tag_id: '   ' }]) {
				const res = await app.request('/api/nfc/scan', scan(body));
				expect(res.status).toBe(400);
				expect(await res.json()).toEqual({ error: 'invalid_request', message: 'Missing tag_id' });
			}
		});

		it('rejects a body that is not JSON', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/scan', { method: 'POST', headers: authHeaders, body: '{tag_id' });

			expect(res.status).toBe(400);
			expect(await res.json()).toMatchObject({ error: 'invalid_request' });
		});

		it('recreates a task deleted through the task API', async () => {
			const { app } = buildApp();
			await app.request('/api/nfc/scan', scan({ tag_id: 'T1', task_title: 'Water Plants' }));
			await app.request('/api/tasks/1', jsonRequest('DELETE'));

			const res = await app.request('/api/nfc/scan', scan({ tag_id: 'T1' }));

			expect(res.status).toBe(201);
			expect(await res.json()).toMatchObject({ status: 'task_created_remapped', task_index: 1, new_status: 0 });
		});
	});

	describe('GET /api/nfc/scan/:identifier', () => {
		it('scans a tag id taken from the URL', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/scan/04:AA:BB?task_title=Dishes&reader=door', { headers: authHeaders });

			expect(res.status).toBe(201);
			expect(await res.json()).toEqual({
				status: 'task_created_and_mapped',
				tag_id: '04:AA:BB',
				task_title: 'Dishes',
				task_index: 1,
				new_status: 0,
				status_name: 'Not Started',
			});
		});

		it('increments a task addressed by its number', async () => {
			const { app } = buildApp();
			await app.request('/api/tasks', jsonRequest('POST', { title: 'Water Plants' }));

			const res = await app.request('/api/nfc/scan/1', { headers: authHeaders });

			expect(res.status).toBe(200);
			expect(await res.json()).toMatchObject({ status: 'task_incremented', task_index: 1, new_status: 1 });
		});

		it('returns 404 for an unknown task number', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/scan/7', { headers: authHeaders });

			expect(res.status).toBe(404);
			expect(await res.json()).toEqual({ error: 'task_not_found', message: 'Task 7 not found' });
		});
	});

	describe('mappings', () => {
		it('creates, lists and deletes mappings', async () => {
			const { app } = buildApp();

			const created = await app.request('/api/nfc/mappings', jsonRequest('POST', { tag_id: 'T5', task_title: 'Sweep' }));
			expect(created.status).toBe(201);
			expect(await created.json()).toEqual({ status: 'mapping_created', tag_id: 'T5', task_title: 'Sweep', task_index: 1 });

			const listed = await app.request('/api/nfc/mappings', { headers: authHeaders });
			expect(await listed.json()).toEqual({ mappings: { T5: 'Sweep' } });

			const deleted = await app.request('/api/nfc/mappings/T5', jsonRequest('DELETE'));
			expect(deleted.status).toBe(200);
			expect(await deleted.json()).toEqual({ status: 'mapping_deleted', tag_id: 'T5' });

			const again = await app.request('/api/nfc/mappings/T5', jsonRequest('DELETE'));
			expect(again.status).toBe(404);
			expect(await again.json()).toEqual({ error: 'mapping_not_found', message: 'No mapping for tag T5' });
		});

		it('does not log a scan when mapping', async () => {
			const { app } = buildApp();
			await app.request('/api/nfc/mappings', jsonRequest('POST', { tag_id: 'T5', task_title: 'Sweep' }));

			const res = await app.request('/api/nfc/pings', { headers: authHeaders });

			expect(await res.json()).toEqual({ pings: [], count: 0 });
		});

		it('requires both the tag and the title', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/mappings', jsonRequest('POST', { tag_id: 'T5' }));

			expect(res.status).toBe(400);
			expect(await res.json()).toEqual({ error: 'invalid_request', message: 'Missing tag_id or task_title' });
		});

		it('imports mappings in bulk', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/mappings/import', jsonRequest('POST', { mappings: { A: 'One', B: '' } }));

			expect(await res.json()).toEqual({ status: 'imported', imported: 1 });
			const listed = await app.request('/api/nfc/mappings', { headers: authHeaders });
			expect(await listed.json()).toEqual({ mappings: { A: 'One' } });
		});
	});

	describe('GET /api/nfc/pings', () => {
		it('returns the newest pings up to the limit', async () => {
			const { app } = buildApp();
			await app.request('/api/nfc/scan', scan({ tag_id: 'T1', task_title: 'Water Plants' }));
			await app.request('/api/nfc/scan', scan({ tag_id: 'T1' }));
			await app.request('/api/nfc/scan', scan({ tag_id: 'T1' }));

			const res = await app.request('/api/nfc/pings?limit=2', { headers: authHeaders });

			expect(res.status).toBe(200);
			expect(await res.json()).toMatchObject({
				count: 2,
				pings: [
					{ tag_id: 'T1', action: 'task_incremented', new_status: 1, reader: 'api', timestamp: '2026-03-01T09:00:00.000Z' },
					{ tag_id: 'T1', action: 'task_incremented', new_status: 2, reader: 'api', timestamp: '2026-03-01T09:00:00.000Z' },
				],
			});
		});

		it('rejects a limit below 1', async () => {
			const { app } = buildApp();

			const res = await app.request('/api/nfc/pings?limit=0', { headers: authHeaders });

			expect(res.status).toBe(400);
			expect(await res.json()).toMatchObject({ error: 'invalid_request' });
		});
	});

	it('reports scan statistics', async () => {
		const { app } = buildApp();
		await app.request('/api/nfc/scan', scan({ tag_id: 'T1', task_title: 'Water Plants' }));
		await app.request('/api/nfc/scan', scan({ tag_id: 'T1' }));

		const res = await app.request('/api/nfc/stats', { headers: authHeaders });

		expect(await res.json()).toEqual({
			stats: {
				total_mappings: 1,
				unique_tasks: 1,
				recent_pings: 2,
				most_used_tag: { tag_id: 'T1', usage_count: 2, mapped_task: 'Water Plants' },
			},
		});
	});
});
