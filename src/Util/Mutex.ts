/**
 * 非同期処理用の排他ロック。
 * JSON ファイルの読み込み→変更→書き込みを1リクエストずつ順番に実行する。
 */
export class Mutex {
	private locked = false;
	private waiters: Array<() => void> = [];

	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}
		await new Promise<void>((resolve) => this.waiters.push(resolve));
	}

	release(): void {
		const next = this.waiters.shift();
		if (next) {
			// ロックを解放せずに次の待ち手へ渡す
			next();
			return;
		}
		this.locked = false;
	}

	async withLock<T>(task: () => T | Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await task();
		} finally {
			this.release();
		}
	}

	get pending(): number {
		return this.waiters.length;
	}
}
