import { Hono } from 'hono';
import type { AppEnv } from '../AppEnv';

// 死活確認。認証なしで見られる
export const healthRoute = new Hono<AppEnv>();

healthRoute.get('/', async (context) => {
	const { tasks, scanner, sink } = context.get('services');

	return context.json({
		status: 'healthy',
		timestamp: new Date().toISOString(),
		task_stats: await tasks.stats(),
		nfc_stats: await scanner.stats(),
		hardware_enabled: sink.enabled,
	});
});
