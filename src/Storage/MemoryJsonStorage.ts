import type { JsonStorage } from './JsonStorage';

// テスト用。JSON 文字列のまま保持する
export class MemoryJsonStorage implements JsonStorage {
	private documents = new Map<string, string>();

	constructor(seed?: Record<string, unknown>) {
		for (const [name, value] of Object.entries(seed ?? {})) {
			this.documents.set(name, JSON.stringify(value));
		}
	}

	read(name: string): Promise<unknown> {
		const text = this.documents.get(name);
		if (text === undefined) {
			return Promise.resolve(undefined);
		}
		const value: unknown = JSON.parse(text);
		return Promise.resolve(value);
	}

	write(name: string, value: unknown): Promise<void> {
		this.documents.set(name, JSON.stringify(value));
		return Promise.resolve();
	}

	has(name: string): boolean {
		return this.documents.has(name);
	}
}
