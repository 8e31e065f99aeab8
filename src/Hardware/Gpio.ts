export type PinLevel = 0 | 1;

export const HIGH: PinLevel = 1;
export const LOW: PinLevel = 0;

/**
 * 出力ピンだけを扱う GPIO の最小インターフェース（BCM 番号）。
 */
export interface Gpio {
	setup(pin: number, initial: PinLevel): Promise<void>;
	write(pin: number, level: PinLevel): Promise<void>;
	cleanup(): Promise<void>;
}

// Raspberry Pi 以外で動かすとき・テスト用。ピンの状態をメモリに持つだけ
export class MockGpio implements Gpio {
	readonly levels = new Map<number, PinLevel>();

	setup(pin: number, initial: PinLevel): Promise<void> {
		this.levels.set(pin, initial);
		return Promise.resolve();
	}

	write(pin: number, level: PinLevel): Promise<void> {
		if (this.levels.has(pin)) {
			this.levels.set(pin, level);
		}
		return Promise.resolve();
	}

	cleanup(): Promise<void> {
		this.levels.clear();
		return Promise.resolve();
	}
}
