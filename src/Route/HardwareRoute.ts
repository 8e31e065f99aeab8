import { Hono } from 'hono';
import type { AppEnv } from '../AppEnv';
import { bearerAuth } from '../Middleware/BearerAuth';

export const hardwareRoute = new Hono<AppEnv>();

hardwareRoute.use('/*', bearerAuth());

// LED ごとの割り当てと現在の色
hardwareRoute.get('/status', (context) => {
	const { sink } = context.get('services');
	return context.json({ hardware_enabled: sink.enabled, groups: sink.describe() });
});

// 保存されている状態で全 LED を塗り直す
hardwareRoute.post('/sync', async (context) => {
	const { tasks, sink } = context.get('services');
	await sink.sync(await tasks.list());
	return context.json({ status: 'synced' });
});
