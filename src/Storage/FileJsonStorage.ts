import { mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import writeFileAtomic from 'write-file-atomic';
import { AppError } from '../Error/AppError';
import { getLogger } from '../logger';
import type { JsonStorage } from './JsonStorage';

const log = getLogger('storage');

const isMissingFile = (error: unknown): boolean => error instanceof Error && 'code' in error && error.code === 'ENOENT';

// dataDir 配下に <name> のファイル名で保存する
export class FileJsonStorage implements JsonStorage {
	constructor(readonly dataDir: string) {}

	pathOf(name: string): string {
		return join(this.dataDir, name);
	}

	async read(name: string): Promise<unknown> {
		const filePath = this.pathOf(name);

		let text: string;
		try {
			text = await readFile(filePath, 'utf8');
		} catch (error) {
			if (isMissingFile(error)) {
				return undefined;
			}
			throw new AppError('storage_error', `Failed to read ${filePath}`, { cause: error });
		}

		// 空ファイルは未作成と同じ扱い
		if (!text.trim()) {
			return undefined;
		}

		try {
			const value: unknown = JSON.parse(text);
			return value;
		} catch (error) {
			throw new AppError('storage_error', `${filePath} is not valid JSON`, { cause: error });
		}
	}

	async write(name: string, value: unknown): Promise<void> {
		const filePath = this.pathOf(name);
		try {
			await mkdir(this.dataDir, { recursive: true });
			// 一時ファイルに書いてから rename する
			await writeFileAtomic(filePath, JSON.stringify(value, null, 2) + '\n', { encoding: 'utf8' });
		} catch (error) {
			throw new AppError('storage_error', `Failed to write ${filePath}`, { cause: error });
		}
		log.debug({ file: filePath }, 'saved');
	}
}
