// タグID → タスクのタイトル
export type NfcMappings = Record<string, string>;

export interface NfcStats {
	total_mappings: number;
	unique_tasks: number;
	recent_pings: number;
	most_used_tag?: {
		tag_id: string;
		usage_count: number;
		mapped_task: string;
	};
}
