import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import z from 'zod';
import type { AppEnv } from '../AppEnv';
import { CREATING_ACTIONS } from '../Entity/ScanEventEntity';
import { AppError } from '../Error/AppError';
import { bearerAuth } from '../Middleware/BearerAuth';
import { rejectInvalid } from '../Middleware/Validation';
import { SCAN_LOG_CAPACITY } from '../Store/ScanLog';

export const nfcRoute = new Hono<AppEnv>();

// TASK_NFC_PUBLIC が有効ならトークンなしでスキャンできる
nfcRoute.use('/*', bearerAuth({ allowPublic: (auth) => auth.nfcPublic }));

// タグのスキャン
nfcRoute.post(
	'/scan',
	zValidator(
		'json',
		z.object({
			tag_id: z.string({ error: 'Missing tag_id' }).trim().min(1, 'Missing tag_id'),
			task_title: z.string().nullish(),
			reader: z.string().trim().min(1).optional(),
		}),
		rejectInvalid
	),
	async (context) => {
		const body = context.req.valid('json');
		const { scanner } = context.get('services');

		const result = await scanner.scan({
			tagId: body.tag_id,
			taskTitle: body.task_title ?? undefined,
			reader: body.reader,
		});

		return context.json(result, CREATING_ACTIONS.has(result.status) ? 201 : 200);
	}
);

// リーダーが URL を叩くだけのスキャン（例: /api/nfc/scan/04:AA:BB:CC や /api/nfc/scan/3）
nfcRoute.get(
	'/scan/:identifier{.+}',
	zValidator(
		'query',
		z.object({
			task_title: z.string().optional(),
			reader: z.string().trim().min(1).optional(),
		}),
		rejectInvalid
	),
	async (context) => {
		const identifier = context.req.param('identifier');
		const query = context.req.valid('query');
		const { scanner } = context.get('services');

		const result = await scanner.scanIdentifier(identifier, { taskTitle: query.task_title, reader: query.reader });

		return context.json(result, CREATING_ACTIONS.has(result.status) ? 201 : 200);
	}
);

nfcRoute.get('/mappings', async (context) => {
	const { mappings } = context.get('services');
	return context.json({ mappings: await mappings.list() });
});

// 状態を進めずにタグだけ登録する
nfcRoute.post(
	'/mappings',
	zValidator(
		'json',
		z.object({
			tag_id: z.string({ error: 'Missing tag_id or task_title' }).trim().min(1, 'Missing tag_id or task_title'),
			task_title: z.string({ error: 'Missing tag_id or task_title' }).trim().min(1, 'Missing tag_id or task_title'),
		}),
		rejectInvalid
	),
	async (context) => {
		const body = context.req.valid('json');
		const { scanner } = context.get('services');

		const taskIndex = await scanner.map(body.tag_id, body.task_title);

		return context.json({ status: 'mapping_created', tag_id: body.tag_id, task_title: body.task_title, task_index: taskIndex }, 201);
	}
);

// バックアップからの一括登録
nfcRoute.post(
	'/mappings/import',
	zValidator('json', z.object({ mappings: z.record(z.string(), z.string()) }), rejectInvalid),
	async (context) => {
		const body = context.req.valid('json');
		const { mappings, mutex } = context.get('services');

		const imported = await mutex.withLock(() => mappings.importMany(body.mappings));

		return context.json({ status: 'imported', imported });
	}
);

nfcRoute.delete('/mappings/:tag_id', async (context) => {
	const tagId = context.req.param('tag_id');
	const { mappings, mutex } = context.get('services');

	const removed = await mutex.withLock(() => mappings.remove(tagId));
	if (!removed) {
		throw new AppError('mapping_not_found', `No mapping for tag ${tagId}`);
	}

	return context.json({ status: 'mapping_deleted', tag_id: tagId });
});

// スキャン履歴（新しいほうから limit 件）
nfcRoute.get(
	'/pings',
	zValidator(
		'query',
		z.object({
			limit: z.coerce.number().int().min(1).max(SCAN_LOG_CAPACITY).default(50),
		}),
		rejectInvalid
	),
	async (context) => {
		const { limit } = context.req.valid('query');
		const { pings } = context.get('services');

		const events = await pings.recent(limit);
		return context.json({ pings: events, count: events.length });
	}
);

nfcRoute.get('/stats', async (context) => {
	const { scanner } = context.get('services');
	return context.json({ stats: await scanner.stats() });
});
