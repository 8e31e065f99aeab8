import z from 'zod';
import type { NfcMappings } from '../Entity/NfcMappingEntity';
import { AppError } from '../Error/AppError';
import { getLogger } from '../logger';
import type { JsonStorage } from '../Storage/JsonStorage';

export const MAPPINGS_FILE = 'nfc_mappings.json';

const log = getLogger('mappings');

// 以前はタスクのオブジェクトごと保存していたので、その形式からはタイトルだけ取り出す
const legacyMappingSchema = z.object({
	title: z.string().optional(),
	task: z.string().optional(),
});

const titleOf = (value: unknown): string | undefined => {
	if (typeof value === 'string') {
		return value;
	}
	const parsed = legacyMappingSchema.safeParse(value);
	if (!parsed.success) {
		return undefined;
	}
	return parsed.data.title ?? parsed.data.task ?? 'Untitled';
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * nfc_mappings.json（タグID → タスクのタイトル）。
 */
export class MappingStore {
	constructor(private readonly storage: JsonStorage) {}

	async list(): Promise<NfcMappings> {
		return Object.fromEntries(await this.load());
	}

	async get(tagId: string): Promise<string | undefined> {
		return (await this.load()).get(tagId);
	}

	async set(tagId: string, title: string): Promise<void> {
		const mappings = await this.load();
		const previous = mappings.get(tagId);
		mappings.set(tagId, title);
		await this.save(mappings);

		if (previous !== undefined && previous !== title) {
			log.info({ tagId, from: previous, to: title }, 'tag remapped');
		} else {
			log.info({ tagId, title }, 'tag mapped');
		}
	}

	async remove(tagId: string): Promise<boolean> {
		const mappings = await this.load();
		if (!mappings.delete(tagId)) {
			return false;
		}
		await this.save(mappings);
		log.info({ tagId }, 'mapping removed');
		return true;
	}

	// タグIDかタイトルが空のものは読み飛ばし、取り込んだ件数を返す
	async importMany(entries: NfcMappings): Promise<number> {
		const mappings = await this.load();
		let imported = 0;

		for (const [tagId, title] of Object.entries(entries)) {
			if (!tagId || !title) {
				continue;
			}
			mappings.set(tagId, title);
			imported += 1;
		}

		if (imported > 0) {
			await this.save(mappings);
			log.info({ imported }, 'mappings imported');
		}
		return imported;
	}

	async tagsForTitle(title: string): Promise<string[]> {
		const wanted = title.toLowerCase();
		const tags: string[] = [];
		for (const [tagId, mapped] of await this.load()) {
			if (mapped.toLowerCase() === wanted) {
				tags.push(tagId);
			}
		}
		return tags;
	}

	private async load(): Promise<Map<string, string>> {
		const raw = await this.storage.read(MAPPINGS_FILE);
		const mappings = new Map<string, string>();
		if (raw === undefined) {
			return mappings;
		}
		if (!isRecord(raw)) {
			throw new AppError('storage_error', `${MAPPINGS_FILE} must contain an object`);
		}

		for (const [tagId, value] of Object.entries(raw)) {
			const title = titleOf(value);
			if (title !== undefined) {
				mappings.set(tagId, title);
			}
		}
		return mappings;
	}

	private async save(mappings: Map<string, string>): Promise<void> {
		await this.storage.write(MAPPINGS_FILE, Object.fromEntries(mappings));
	}
}
