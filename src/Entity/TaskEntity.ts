import type { TaskStatus } from './TaskStatus';

// tasks.json に保存される1件分のタスク
// id は一覧内の位置（1始まり）で、削除や並び替えのたびに振り直される
export interface TaskEntity {
	id: number | null;
	title: string;
	status: TaskStatus;
	priority: number;
	effort: number;
	due_date: string | null;
	created_at: string;
	updated_at: string;
	has_subtasks: boolean;
	subtasks: TaskEntity[];
}

export interface NewTask {
	title: string;
	priority?: number;
	effort?: number;
	due_date?: string | null;
}

export const SORT_KEYS = ['priority', 'due_date', 'effort', 'status', 'title'] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export interface TaskStats {
	total: number;
	not_started: number;
	in_progress: number;
	completed: number;
	has_subtasks: number;
	overdue: number;
}
