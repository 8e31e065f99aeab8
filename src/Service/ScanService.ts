import type { NfcStats } from '../Entity/NfcMappingEntity';
import type { ScanAction, ScanResponse } from '../Entity/ScanEventEntity';
import { statusName, type TaskStatus } from '../Entity/TaskStatus';
import { AppError } from '../Error/AppError';
import { dispatchToSink, type StatusSink } from '../Hardware/StatusSink';
import { getLogger } from '../logger';
import type { MappingStore } from '../Store/MappingStore';
import type { ScanLog } from '../Store/ScanLog';
import type { TaskStore } from '../Store/TaskStore';
import { Mutex } from '../Util/Mutex';

export const DEFAULT_READER = 'api';

// 統計で見る直近のスキャン件数
const STATS_WINDOW = 100;

const log = getLogger('scan');

export interface ScanRequest {
	tagId: string;
	taskTitle?: string;
	reader?: string;
}

export interface ScanServiceDeps {
	tasks: TaskStore;
	mappings: MappingStore;
	pings: ScanLog;
	sink: StatusSink;
	mutex?: Mutex;
}

/**
 * NFC タグのスキャンを処理する。
 *
 * - 登録済みのタグでタスクがある → 状態を1つ進める
 * - 登録済みのタグでタスクが消えている → 状態 0 で作り直す
 * - 未登録のタグでタイトルあり → タスクを用意してタグを登録する
 * - 未登録のタグでタイトルなし → unmapped_tag（何も変更しない）
 *
 * ストアへの書き込みが終わってから LED に反映する。LED の失敗は応答に影響しない。
 */
export class ScanService {
	private readonly tasks: TaskStore;
	private readonly mappings: MappingStore;
	private readonly pings: ScanLog;
	private readonly sink: StatusSink;
	readonly mutex: Mutex;

	constructor(deps: ScanServiceDeps) {
		this.tasks = deps.tasks;
		this.mappings = deps.mappings;
		this.pings = deps.pings;
		this.sink = deps.sink;
		this.mutex = deps.mutex ?? new Mutex();
	}

	scan(request: ScanRequest): Promise<ScanResponse> {
		return this.mutex.withLock(() => this.resolveTag(request));
	}

	/**
	 * URL から来たスキャン。数字だけの識別子はタスク番号として扱い、それ以外はタグIDとして扱う。
	 */
	async scanIdentifier(identifier: string, options: Omit<ScanRequest, 'tagId'> = {}): Promise<ScanResponse> {
		if (!/^\d+$/.test(identifier)) {
			return this.scan({ ...options, tagId: identifier });
		}

		return this.mutex.withLock(async () => {
			const reader = options.reader ?? DEFAULT_READER;
			const taskIndex = Number(identifier);

			const task = await this.tasks.setStatus(taskIndex);
			if (task) {
				return this.record(identifier, 'task_incremented', task.title, taskIndex, task.status, reader);
			}

			const title = cleanTitle(options.taskTitle);
			if (!title) {
				throw new AppError('task_not_found', `Task ${taskIndex} not found`);
			}

			const createdIndex = await this.tasks.add({ title });
			await this.mappings.set(identifier, title);
			return this.record(identifier, 'task_created_and_mapped', title, createdIndex, 0, reader);
		});
	}

	/**
	 * タグをタスクに紐づける（状態は変えない）。タスクがなければ作る。
	 */
	map(tagId: string, title: string): Promise<number> {
		return this.mutex.withLock(async () => {
			const taskIndex = (await this.tasks.findIndexByTitle(title)) ?? (await this.tasks.add({ title }));
			await this.mappings.set(tagId, title);
			return taskIndex;
		});
	}

	async stats(): Promise<NfcStats> {
		const mappings = await this.mappings.list();
		const recent = await this.pings.recent(STATS_WINDOW);

		const stats: NfcStats = {
			total_mappings: Object.keys(mappings).length,
			unique_tasks: new Set(Object.values(mappings)).size,
			recent_pings: recent.length,
		};

		const usage = new Map<string, number>();
		for (const ping of recent) {
			usage.set(ping.tag_id, (usage.get(ping.tag_id) ?? 0) + 1);
		}

		// 同数の場合は先に出てきたタグを採用する
		for (const [tagId, count] of usage) {
			if (!stats.most_used_tag || count > stats.most_used_tag.usage_count) {
				stats.most_used_tag = { tag_id: tagId, usage_count: count, mapped_task: Object.hasOwn(mappings, tagId) ? mappings[tagId] : 'Unmapped' };
			}
		}

		return stats;
	}

	private async resolveTag(request: ScanRequest): Promise<ScanResponse> {
		const { tagId } = request;
		const reader = request.reader ?? DEFAULT_READER;
		const suppliedTitle = cleanTitle(request.taskTitle);
		// 空文字で登録されているタグは未登録と同じ扱い
		const mappedTitle = (await this.mappings.get(tagId)) || undefined;

		if (mappedTitle) {
			const taskIndex = await this.tasks.findIndexByTitle(mappedTitle);
			if (taskIndex !== undefined) {
				const task = await this.tasks.setStatus(taskIndex);
				if (task) {
					return this.record(tagId, 'task_incremented', mappedTitle, taskIndex, task.status, reader);
				}
			}

			// タスクが削除されていたら、指定のタイトル（なければ登録済みのタイトル）で作り直す
			const title = suppliedTitle ?? mappedTitle;
			const existingIndex = title === mappedTitle ? undefined : await this.tasks.findIndexByTitle(title);
			if (title !== mappedTitle) {
				await this.mappings.set(tagId, title);
			}
			if (existingIndex !== undefined) {
				return this.incrementMapped(tagId, title, existingIndex, reader);
			}
			const createdIndex = await this.tasks.add({ title });
			return this.record(tagId, 'task_created_remapped', title, createdIndex, 0, reader);
		}

		if (!suppliedTitle) {
			throw new AppError('unmapped_tag', `Tag ${tagId} is not mapped to a task. Provide task_title to map it.`);
		}

		const existingIndex = await this.tasks.findIndexByTitle(suppliedTitle);
		await this.mappings.set(tagId, suppliedTitle);

		if (existingIndex !== undefined) {
			return this.incrementMapped(tagId, suppliedTitle, existingIndex, reader);
		}

		const createdIndex = await this.tasks.add({ title: suppliedTitle });
		return this.record(tagId, 'task_created_and_mapped', suppliedTitle, createdIndex, 0, reader);
	}

	// 既存タスクにタグを付け替えたときは、そのタスクの状態を1つ進める
	private async incrementMapped(tagId: string, title: string, taskIndex: number, reader: string): Promise<ScanResponse> {
		const task = await this.tasks.setStatus(taskIndex);
		if (!task) {
			throw new AppError('task_not_found', `Task ${taskIndex} not found`);
		}
		return this.record(tagId, 'task_mapped_and_incremented', title, taskIndex, task.status, reader);
	}

	private async record(
		tagId: string,
		action: ScanAction,
		title: string,
		taskIndex: number,
		newStatus: TaskStatus,
		reader: string
	): Promise<ScanResponse> {
		await this.pings.append({
			tag_id: tagId,
			action,
			task_title: title,
			task_index: taskIndex,
			new_status: newStatus,
			reader,
		});

		log.info({ tagId, action, taskIndex, newStatus }, 'tag scanned');
		dispatchToSink(`LED update for task ${taskIndex}`, () => this.sink.show(taskIndex, newStatus));

		return {
			status: action,
			tag_id: tagId,
			task_title: title,
			task_index: taskIndex,
			new_status: newStatus,
			status_name: statusName(newStatus),
		};
	}
}

const cleanTitle = (title: string | undefined): string | undefined => {
	const trimmed = title?.trim();
	return trimmed ? trimmed : undefined;
};
