import type { TaskEntity } from '../Entity/TaskEntity';
import type { TaskStatus } from '../Entity/TaskStatus';
import { getLogger } from '../logger';
import { Mutex } from '../Util/Mutex';
import { HIGH, LOW, type Gpio, type PinLevel } from './Gpio';
import { STATUS_COLORS, type LedColor, type LedGroupInfo, type RgbPins, type StatusSink } from './StatusSink';

const log = getLogger('led');

// アノードコモンなので LOW で点灯する
const LEVELS: Record<LedColor, readonly [PinLevel, PinLevel, PinLevel]> = {
	off: [HIGH, HIGH, HIGH],
	red: [LOW, HIGH, HIGH],
	yellow: [LOW, LOW, HIGH],
	green: [HIGH, LOW, HIGH],
	blue: [HIGH, HIGH, LOW],
	purple: [LOW, HIGH, LOW],
};

/**
 * RGB LED にタスクの状態を表示する。
 * n 番目のピン組が n 番目のタスクを表し、LED の割り当てがないタスクは無視する。
 * show / sync / close は呼ばれた順に1つずつ実行する。
 */
export class LedStatusSink implements StatusSink {
	readonly enabled = true;
	private readonly colors = new Map<number, LedColor>();
	private readonly lock = new Mutex();
	private ready: Promise<void> | undefined;

	constructor(
		private readonly gpio: Gpio,
		private readonly pins: readonly RgbPins[]
	) {}

	show(taskIndex: number, status: TaskStatus): Promise<void> {
		const pins = this.pins[taskIndex - 1];
		if (!pins) {
			return Promise.resolve();
		}
		return this.lock.withLock(() => this.paint(taskIndex, pins, STATUS_COLORS[status]));
	}

	sync(tasks: readonly TaskEntity[]): Promise<void> {
		return this.lock.withLock(async () => {
			for (const [position, pins] of this.pins.entries()) {
				const task = tasks[position];
				await this.paint(position + 1, pins, task ? STATUS_COLORS[task.status] : 'off');
			}
		});
	}

	describe(): LedGroupInfo[] {
		return this.pins.map((pins, position) => ({
			task_id: position + 1,
			pins,
			color: this.colors.get(position + 1) ?? 'off',
		}));
	}

	close(): Promise<void> {
		return this.lock.withLock(async () => {
			if (this.ready) {
				for (const [position, pins] of this.pins.entries()) {
					await this.paint(position + 1, pins, 'off');
				}
			}
			await this.gpio.cleanup();
			this.ready = undefined;
			this.colors.clear();
		});
	}

	private async paint(taskIndex: number, pins: RgbPins, color: LedColor): Promise<void> {
		await this.setup();
		const [r, g, b] = LEVELS[color];
		await this.gpio.write(pins.r, r);
		await this.gpio.write(pins.g, g);
		await this.gpio.write(pins.b, b);
		this.colors.set(taskIndex, color);
		log.debug({ taskIndex, color }, 'led updated');
	}

	// 最初の書き込みの前に一度だけ全ピンを消灯状態で初期化する
	private setup(): Promise<void> {
		this.ready ??= (async () => {
			for (const pins of this.pins) {
				await this.gpio.setup(pins.r, HIGH);
				await this.gpio.setup(pins.g, HIGH);
				await this.gpio.setup(pins.b, HIGH);
			}
		})().catch((error: unknown) => {
			// 次回また初期化をやり直せるようにする
			this.ready = undefined;
			throw error;
		});
		return this.ready;
	}
}
