// タスクの進捗は 0 → 1 → 2 → 0 の3値で循環する
export const TASK_STATUSES = [0, 1, 2] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const STATUS_NAMES = {
	0: 'Not Started',
	1: 'In Progress',
	2: 'Completed',
} as const satisfies Record<TaskStatus, string>;

export type StatusName = (typeof STATUS_NAMES)[TaskStatus];

// 範囲外の値は 0〜2 に丸める（NaN は 0 扱い）
export const toTaskStatus = (value: number): TaskStatus => {
	const clamped = Math.max(0, Math.min(2, Math.trunc(value)));
	if (clamped === 1) {
		return 1;
	}
	if (clamped === 2) {
		return 2;
	}
	return 0;
};

export const nextStatus = (status: TaskStatus): TaskStatus => toTaskStatus((status + 1) % 3);

export const statusName = (status: TaskStatus): StatusName => STATUS_NAMES[status];
