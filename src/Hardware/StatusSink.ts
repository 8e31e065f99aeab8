import type { TaskEntity } from '../Entity/TaskEntity';
import type { TaskStatus } from '../Entity/TaskStatus';
import { getLogger } from '../logger';

export type LedColor = 'off' | 'red' | 'yellow' | 'green' | 'blue' | 'purple';

export const STATUS_COLORS: Record<TaskStatus, LedColor> = {
	0: 'red',
	1: 'yellow',
	2: 'green',
};

export interface RgbPins {
	r: number;
	g: number;
	b: number;
}

export interface LedGroupInfo {
	task_id: number;
	pins: RgbPins;
	color: LedColor;
}

/**
 * タスクの状態を外部（LED）に反映する出力先。
 * 失敗してもリクエストには影響させない。
 */
export interface StatusSink {
	readonly enabled: boolean;
	show(taskIndex: number, status: TaskStatus): Promise<void>;
	/** 全タスクの状態で表示を塗り直す */
	sync(tasks: readonly TaskEntity[]): Promise<void>;
	describe(): LedGroupInfo[];
	close(): Promise<void>;
}

export class NoopStatusSink implements StatusSink {
	readonly enabled = false;

	show(): Promise<void> {
		return Promise.resolve();
	}

	sync(): Promise<void> {
		return Promise.resolve();
	}

	describe(): LedGroupInfo[] {
		return [];
	}

	close(): Promise<void> {
		return Promise.resolve();
	}
}

const log = getLogger('hardware');

/**
 * 出力を待たずに実行し、失敗は warn ログだけ残す。
 */
export function dispatchToSink(label: string, action: () => Promise<void>): void {
	let pending: Promise<void>;
	try {
		pending = action();
	} catch (error) {
		log.warn({ err: error }, `${label} failed`);
		return;
	}
	void pending.catch((error: unknown) => {
		log.warn({ err: error }, `${label} failed`);
	});
}
