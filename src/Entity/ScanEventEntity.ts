import type { StatusName, TaskStatus } from './TaskStatus';

export const SCAN_ACTIONS = ['task_incremented', 'task_created_remapped', 'task_created_and_mapped', 'task_mapped_and_incremented'] as const;

export type ScanAction = (typeof SCAN_ACTIONS)[number];

// 新しくタスクを作った結果は 201 で返す
export const CREATING_ACTIONS: ReadonlySet<ScanAction> = new Set(['task_created_remapped', 'task_created_and_mapped']);

// nfc_pings.json に追記されるスキャン履歴
// action は古いログに残っている値も読めるように string のままにしておく
export interface ScanEventEntity {
	tag_id: string;
	action: string;
	task_title: string | null;
	task_index: number | null;
	new_status: TaskStatus | null;
	reader: string;
	timestamp: string;
}

export interface ScanResponse {
	status: ScanAction;
	tag_id: string;
	task_title: string;
	task_index: number;
	new_status: TaskStatus;
	status_name: StatusName;
}
