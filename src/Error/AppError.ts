import type { ContentfulStatusCode } from 'hono/utils/http-status';

export type ErrorKind =
	| 'unauthorized'
	| 'invalid_request'
	| 'not_found'
	| 'unmapped_tag'
	| 'task_not_found'
	| 'mapping_not_found'
	| 'storage_error';

const STATUS_BY_KIND: Record<ErrorKind, ContentfulStatusCode> = {
	unauthorized: 401,
	invalid_request: 400,
	not_found: 404,
	unmapped_tag: 400,
	task_not_found: 404,
	mapping_not_found: 404,
	storage_error: 500,
};

export interface ErrorBody {
	error: string;
	message: string;
}

/**
 * ルートやストアから投げるエラー。
 * app.onError で `{ error, message }` の JSON に変換される。
 */
export class AppError extends Error {
	readonly kind: ErrorKind;
	readonly status: ContentfulStatusCode;

	constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = 'AppError';
		this.kind = kind;
		this.status = STATUS_BY_KIND[kind];
	}

	toJSON(): ErrorBody {
		return { error: this.kind, message: this.message };
	}
}
