import { access, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getLogger } from '../logger';
import type { Gpio, PinLevel } from './Gpio';

const log = getLogger('gpio');

const exists = async (path: string): Promise<boolean> => {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
};

/**
 * /sys/class/gpio 経由でピンを操作する。
 * setup で export して出力方向にし、以降は value ファイルに 0/1 を書く。
 */
export class SysfsGpio implements Gpio {
	private readonly exported = new Set<number>();

	constructor(readonly root = '/sys/class/gpio') {}

	async setup(pin: number, initial: PinLevel): Promise<void> {
		const pinDir = join(this.root, `gpio${pin}`);
		if (!(await exists(pinDir))) {
			await writeFile(join(this.root, 'export'), String(pin));
			this.exported.add(pin);
		}
		// direction に high/low を書くと出力方向＋初期値をまとめて設定できる
		await writeFile(join(pinDir, 'direction'), initial === 1 ? 'high' : 'low');
		log.debug({ pin, initial }, 'pin configured');
	}

	async write(pin: number, level: PinLevel): Promise<void> {
		await writeFile(join(this.root, `gpio${pin}`, 'value'), String(level));
	}

	// 自分で export したピンだけ unexport する
	async cleanup(): Promise<void> {
		for (const pin of this.exported) {
			await writeFile(join(this.root, 'unexport'), String(pin));
		}
		this.exported.clear();
	}
}
