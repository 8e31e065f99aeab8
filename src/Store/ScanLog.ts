import z from 'zod';
import type { ScanEventEntity } from '../Entity/ScanEventEntity';
import { toTaskStatus } from '../Entity/TaskStatus';
import { getLogger } from '../logger';
import type { JsonStorage } from '../Storage/JsonStorage';

export const SCAN_LOG_FILE = 'nfc_pings.json';
export const SCAN_LOG_CAPACITY = 1000;

const log = getLogger('scan-log');

const storedEventSchema = z.object({
	tag_id: z.string(),
	action: z.string(),
	task_title: z.string().nullable().default(null),
	task_index: z.number().int().nullable().default(null),
	new_status: z.number().int().nullable().default(null),
	reader: z.string().default('unknown'),
	timestamp: z.string(),
});

export type NewScanEvent = Omit<ScanEventEntity, 'timestamp'>;

/**
 * nfc_pings.json のスキャン履歴。
 * 古い順に並び、上限を超えた分は古いものから捨てる。
 */
export class ScanLog {
	private readonly capacity: number;
	private readonly now: () => Date;

	constructor(
		private readonly storage: JsonStorage,
		options?: { capacity?: number; now?: () => Date }
	) {
		this.capacity = options?.capacity ?? SCAN_LOG_CAPACITY;
		this.now = options?.now ?? (() => new Date());
	}

	async append(event: NewScanEvent): Promise<ScanEventEntity> {
		const entry: ScanEventEntity = { ...event, timestamp: this.now().toISOString() };
		const events = await this.load();
		events.push(entry);

		await this.storage.write(SCAN_LOG_FILE, events.slice(-this.capacity));
		log.info({ tagId: entry.tag_id, action: entry.action }, 'scan logged');
		return entry;
	}

	// 新しいほうから limit 件（並びは古い順）
	async recent(limit = 50): Promise<ScanEventEntity[]> {
		if (limit <= 0) {
			return [];
		}
		return (await this.load()).slice(-limit);
	}

	private async load(): Promise<ScanEventEntity[]> {
		let raw: unknown;
		try {
			raw = await this.storage.read(SCAN_LOG_FILE);
		} catch (error) {
			// 読めない履歴は空として扱い、次の追記で書き直す
			log.warn({ err: error }, 'scan log unreadable, starting a new one');
			return [];
		}
		if (raw === undefined) {
			return [];
		}
		if (!Array.isArray(raw)) {
			log.warn('scan log is not an array, starting a new one');
			return [];
		}

		const events = raw.flatMap((entry: unknown): ScanEventEntity[] => {
			const parsed = storedEventSchema.safeParse(entry);
			if (!parsed.success) {
				return [];
			}
			const { new_status, ...rest } = parsed.data;
			return [{ ...rest, new_status: new_status === null ? null : toTaskStatus(new_status) }];
		});
		if (events.length < raw.length) {
			// 次の追記で書き戻すときにこの分は消える
			log.warn({ dropped: raw.length - events.length }, 'skipped malformed scan log entries');
		}
		return events;
	}
}
