import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import z from 'zod';
import type { AppEnv } from '../AppEnv';
import { SORT_KEYS, type TaskEntity } from '../Entity/TaskEntity';
import { statusName } from '../Entity/TaskStatus';
import { AppError } from '../Error/AppError';
import { dispatchToSink } from '../Hardware/StatusSink';
import { bearerAuth } from '../Middleware/BearerAuth';
import { rejectInvalid } from '../Middleware/Validation';

export const taskRoute = new Hono<AppEnv>();

taskRoute.use('/*', bearerAuth());

// null や省略は「1つ進める」。数値は toTaskStatus で切り捨て・丸める
const statusBodySchema = z.object({
	status: z.number().nullish(),
});

const dateString = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'due_date must be a date (YYYY-MM-DD)');

// タスク一覧（status で絞り込み、include_subtasks=false でサブタスクを省く）
taskRoute.get(
	'/',
	zValidator(
		'query',
		z.object({
			status: z.coerce.number().int().min(0).max(2).optional(),
			include_subtasks: z.enum(['true', 'false']).default('true'),
		}),
		rejectInvalid
	),
	async (context) => {
		const query = context.req.valid('query');
		const { tasks } = context.get('services');

		const all = await tasks.list();
		const filtered = query.status === undefined ? all : all.filter((task) => task.status === query.status);
		const body: Array<TaskEntity | Omit<TaskEntity, 'subtasks'>> =
			query.include_subtasks === 'true' ? filtered : filtered.map(({ subtasks: _subtasks, ...task }) => task);

		return context.json({ tasks: body, total_count: all.length, filtered_count: filtered.length });
	}
);

taskRoute.post(
	'/',
	zValidator(
		'json',
		z.object({
			title: z.string({ error: 'Missing task title' }).trim().min(1, 'Missing task title'),
			priority: z.number().int().optional(),
			effort: z.number().int().optional(),
			due_date: dateString.nullish(),
		}),
		rejectInvalid
	),
	async (context) => {
		const body = context.req.valid('json');
		const { tasks, mutex, sink } = context.get('services');

		const taskIndex = await mutex.withLock(async () => {
			const created = await tasks.add({ title: body.title, priority: body.priority, effort: body.effort, due_date: body.due_date ?? null });
			dispatchToSink(`LED update for task ${created}`, () => sink.show(created, 0));
			return created;
		});

		return context.json({ status: 'created', task_index: taskIndex, title: body.title }, 201);
	}
);

taskRoute.get('/stats', async (context) => {
	const { tasks } = context.get('services');
	return context.json({ stats: await tasks.stats() });
});

// 並び替えると id が振り直されるので LED も全部塗り直す
taskRoute.post(
	'/sort',
	zValidator('json', z.object({ sort_by: z.enum(SORT_KEYS).default('priority') }), rejectInvalid),
	async (context) => {
		const { sort_by } = context.req.valid('json');
		const { tasks, mutex, sink } = context.get('services');

		await mutex.withLock(async () => {
			const sorted = await tasks.sort(sort_by);
			dispatchToSink('LED sync', () => sink.sync(sorted));
		});

		return context.json({ status: 'sorted', sort_by });
	}
);

taskRoute.get('/:id{[0-9]+}', async (context) => {
	const id = Number(context.req.param('id'));
	const { tasks, mappings } = context.get('services');

	const task = await tasks.get(id);
	if (!task) {
		throw new AppError('task_not_found', `Task ${id} not found`);
	}

	return context.json({ task, nfc_tags: await mappings.tagsForTitle(task.title) });
});

// 空ボディなら状態を1つ進め、{ status } があればその値にする
taskRoute.put('/:id{[0-9]+}/status', async (context) => {
	const id = Number(context.req.param('id'));
	const { tasks, mutex, sink } = context.get('services');

	const text = await context.req.text();
	let raw: unknown = {};
	if (text.trim()) {
		try {
			raw = JSON.parse(text);
		} catch (error) {
			throw new AppError('invalid_request', 'Malformed JSON in request body', { cause: error });
		}
	}
	const parsed = statusBodySchema.safeParse(raw);
	rejectInvalid(parsed);
	const requested = parsed.success ? (parsed.data.status ?? undefined) : undefined;

	const task = await mutex.withLock(async () => {
		const updated = await tasks.setStatus(id, requested);
		if (updated) {
			dispatchToSink(`LED update for task ${id}`, () => sink.show(id, updated.status));
		}
		return updated;
	});
	if (!task) {
		throw new AppError('task_not_found', `Task ${id} not found`);
	}

	return context.json({ status: 'updated', task_id: id, new_status: task.status, status_name: statusName(task.status) });
});

taskRoute.delete('/:id{[0-9]+}', async (context) => {
	const id = Number(context.req.param('id'));
	const { tasks, mutex, sink } = context.get('services');

	const removed = await mutex.withLock(async () => {
		const task = await tasks.remove(id);
		if (task) {
			// 後ろのタスクの番号が詰まるので LED を塗り直す
			const remaining = await tasks.list();
			dispatchToSink('LED sync', () => sink.sync(remaining));
		}
		return task;
	});
	if (!removed) {
		throw new AppError('task_not_found', `Task ${id} not found`);
	}

	return context.json({ status: 'deleted', task_id: id });
});
