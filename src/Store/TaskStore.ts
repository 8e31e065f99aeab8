import z from 'zod';
import type { NewTask, SortKey, TaskEntity, TaskStats } from '../Entity/TaskEntity';
import { nextStatus, toTaskStatus } from '../Entity/TaskStatus';
import { AppError } from '../Error/AppError';
import { getLogger } from '../logger';
import type { JsonStorage } from '../Storage/JsonStorage';

export const TASKS_FILE = 'tasks.json';

const log = getLogger('tasks');

// 古い形式（task / want キー）も受け付ける
const storedTaskSchema = z.object({
	id: z.number().nullable().optional(),
	title: z.string().optional(),
	task: z.string().optional(),
	status: z.coerce.number().optional(),
	priority: z.coerce.number().optional(),
	want: z.coerce.number().optional(),
	effort: z.coerce.number().optional(),
	due_date: z.string().nullable().optional(),
	created_at: z.string().optional(),
	updated_at: z.string().optional(),
	has_subtasks: z.boolean().optional(),
	subtasks: z.array(z.unknown()).optional(),
});

// priority と effort は 0〜10
const clampScore = (value: number): number => Math.max(0, Math.min(10, Math.trunc(value)));

const sameTitle = (a: string, b: string): boolean => a.trim().toLowerCase() === b.trim().toLowerCase();

const compareValues = <T extends number | string>(a: T, b: T): number => {
	if (a === b) {
		return 0;
	}
	return a < b ? -1 : 1;
};

// 期限なし・日付として読めない期限は最後に並べる
const dueKey = (task: TaskEntity): number => {
	const time = task.due_date ? Date.parse(task.due_date) : Number.NaN;
	return Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
};

const COMPARATORS: Record<SortKey, (a: TaskEntity, b: TaskEntity) => number> = {
	priority: (a, b) => compareValues(b.priority, a.priority),
	due_date: (a, b) => compareValues(dueKey(a), dueKey(b)),
	effort: (a, b) => compareValues(a.effort, b.effort),
	status: (a, b) => compareValues(a.status, b.status),
	title: (a, b) => compareValues(a.title.toLowerCase(), b.title.toLowerCase()),
};

const localDate = (date: Date): string =>
	[date.getFullYear(), String(date.getMonth() + 1).padStart(2, '0'), String(date.getDate()).padStart(2, '0')].join('-');

export function normalizeTask(raw: unknown, timestamp: string): TaskEntity {
	if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
		return {
			id: null,
			title: String(raw),
			status: 0,
			priority: 0,
			effort: 0,
			due_date: null,
			created_at: timestamp,
			updated_at: timestamp,
			has_subtasks: false,
			subtasks: [],
		};
	}

	const parsed = storedTaskSchema.safeParse(raw);
	if (!parsed.success) {
		throw new AppError('storage_error', `Malformed task record: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
	}

	const task = parsed.data;
	const subtasks = (task.subtasks ?? []).map((subtask) => normalizeTask(subtask, timestamp));

	return {
		id: task.id ?? null,
		title: task.title ?? task.task ?? '',
		status: toTaskStatus(task.status ?? 0),
		priority: Math.trunc(task.priority ?? task.want ?? 0),
		effort: Math.trunc(task.effort ?? 0),
		due_date: task.due_date ?? null,
		created_at: task.created_at ?? timestamp,
		updated_at: task.updated_at ?? timestamp,
		// サブタスクがあればフラグも立てる
		has_subtasks: (task.has_subtasks ?? false) || subtasks.length > 0,
		subtasks,
	};
}

/**
 * tasks.json のタスク一覧。
 * 呼び出しごとにファイルを読み直し、変更があれば全体を書き戻す。
 * index はすべて 1 始まり。
 */
export class TaskStore {
	private readonly now: () => Date;

	constructor(
		private readonly storage: JsonStorage,
		options?: { now?: () => Date }
	) {
		this.now = options?.now ?? (() => new Date());
	}

	async list(): Promise<TaskEntity[]> {
		const raw = await this.storage.read(TASKS_FILE);
		if (raw === undefined) {
			return [];
		}
		if (!Array.isArray(raw)) {
			throw new AppError('storage_error', `${TASKS_FILE} must contain an array`);
		}
		const timestamp = this.now().toISOString();
		// id は位置と一致させる
		return raw.map((entry: unknown, position) => ({ ...normalizeTask(entry, timestamp), id: position + 1 }));
	}

	async count(): Promise<number> {
		return (await this.list()).length;
	}

	async get(index: number): Promise<TaskEntity | undefined> {
		const tasks = await this.list();
		return tasks[index - 1];
	}

	// タイトルは大文字小文字と前後の空白を無視して比較し、最初に一致したものを返す
	async findIndexByTitle(title: string): Promise<number | undefined> {
		const tasks = await this.list();
		const position = tasks.findIndex((task) => sameTitle(task.title, title));
		return position === -1 ? undefined : position + 1;
	}

	async add(input: NewTask): Promise<number> {
		const tasks = await this.list();
		const timestamp = this.now().toISOString();

		tasks.push({
			id: tasks.length + 1,
			title: input.title,
			status: 0,
			priority: clampScore(input.priority ?? 0),
			effort: clampScore(input.effort ?? 0),
			due_date: input.due_date ?? null,
			created_at: timestamp,
			updated_at: timestamp,
			has_subtasks: false,
			subtasks: [],
		});

		await this.save(tasks);
		log.info({ title: input.title, index: tasks.length }, 'task added');
		return tasks.length;
	}

	/**
	 * status を省略すると 0 → 1 → 2 → 0 と1つ進める。
	 * 指定した場合は 0〜2 に丸めて設定する。
	 */
	async setStatus(index: number, status?: number): Promise<TaskEntity | undefined> {
		const tasks = await this.list();
		const task = tasks[index - 1];
		if (!task) {
			return undefined;
		}

		task.status = status === undefined ? nextStatus(task.status) : toTaskStatus(status);
		task.updated_at = this.now().toISOString();

		await this.save(tasks);
		log.info({ index, status: task.status }, 'task status updated');
		return task;
	}

	async remove(index: number): Promise<TaskEntity | undefined> {
		const tasks = await this.list();
		if (!tasks[index - 1]) {
			return undefined;
		}

		const [removed] = tasks.splice(index - 1, 1);
		await this.save(tasks);
		log.info({ index, title: removed?.title }, 'task removed');
		return removed;
	}

	async sort(by: SortKey): Promise<TaskEntity[]> {
		const tasks = await this.list();
		tasks.sort(COMPARATORS[by]);
		await this.save(tasks);
		log.info({ by }, 'tasks sorted');
		return this.list();
	}

	async stats(): Promise<TaskStats> {
		const tasks = await this.list();
		const today = localDate(this.now());

		const stats: TaskStats = { total: tasks.length, not_started: 0, in_progress: 0, completed: 0, has_subtasks: 0, overdue: 0 };

		for (const task of tasks) {
			if (task.status === 0) {
				stats.not_started += 1;
			} else if (task.status === 1) {
				stats.in_progress += 1;
			} else {
				stats.completed += 1;
			}

			if (task.has_subtasks) {
				stats.has_subtasks += 1;
			}

			// 完了済みは期限切れに数えない
			if (task.due_date && task.status !== 2 && !Number.isNaN(Date.parse(task.due_date)) && task.due_date.slice(0, 10) < today) {
				stats.overdue += 1;
			}
		}

		return stats;
	}

	private async save(tasks: TaskEntity[]): Promise<void> {
		await this.storage.write(
			TASKS_FILE,
			tasks.map((task, position) => ({ ...task, id: position + 1 }))
		);
	}
}
