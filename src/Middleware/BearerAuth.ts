import type { MiddlewareHandler } from 'hono';
import { timingSafeEqual } from 'hono/utils/buffer';
import type { AppEnv, AuthSettings } from '../AppEnv';
import { AppError } from '../Error/AppError';

/**
 * Authorization: Bearer <token> を確認するミドルウェア。
 * allowPublic が true を返すルートは確認を省略する。
 */
export const bearerAuth = (options?: { allowPublic?: (auth: AuthSettings) => boolean }): MiddlewareHandler<AppEnv> => {
	return async (context, next) => {
		const { auth } = context.get('services');

		if (options?.allowPublic?.(auth)) {
			await next();
			return;
		}

		const header = context.req.header('Authorization') ?? '';
		// "Bearer " で始まらないものはトークンなし扱い
		const accessToken = header.startsWith('Bearer ') ? header.slice('Bearer '.length) : undefined;

		if (!accessToken || !(await timingSafeEqual(accessToken, auth.authToken))) {
			throw new AppError('unauthorized', 'Missing or invalid bearer token');
		}

		await next();
	};
};
