import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import type { AppEnv, AuthSettings, Services } from './AppEnv';
import { AppError } from './Error/AppError';
import type { StatusSink } from './Hardware/StatusSink';
import { getLogger } from './logger';
import { hardwareRoute } from './Route/HardwareRoute';
import { healthRoute } from './Route/HealthRoute';
import { nfcRoute } from './Route/NfcRoute';
import { taskRoute } from './Route/TaskRoute';
import { ScanService } from './Service/ScanService';
import type { JsonStorage } from './Storage/JsonStorage';
import { MappingStore } from './Store/MappingStore';
import { ScanLog } from './Store/ScanLog';
import { TaskStore } from './Store/TaskStore';
import { Mutex } from './Util/Mutex';

const log = getLogger('http');

export interface ServiceOptions {
	storage: JsonStorage;
	sink: StatusSink;
	auth: AuthSettings;
	now?: () => Date;
}

// ストア・スキャン処理・LED 出力をまとめて組み立てる
export function createServices(options: ServiceOptions): Services {
	const mutex = new Mutex();
	const tasks = new TaskStore(options.storage, { now: options.now });
	const mappings = new MappingStore(options.storage);
	const pings = new ScanLog(options.storage, { now: options.now });
	const scanner = new ScanService({ tasks, mappings, pings, sink: options.sink, mutex });

	return { auth: options.auth, tasks, mappings, pings, scanner, sink: options.sink, mutex };
}

export function createApp(services: Services, options?: { corsOrigins?: string[] }) {
	const app = new Hono<AppEnv>();

	app.use('*', logger((message) => log.info(message)));

	if (options?.corsOrigins?.length) {
		app.use('/api/*', cors({ origin: options.corsOrigins }));
	}

	app
		// 各ルートから context.get('services') で使えるようにする
		.use('/api/*', async (context, next) => {
			context.set('services', services);
			await next();
		})
		.route('/api/health', healthRoute)
		.route('/api/nfc', nfcRoute)
		.route('/api/tasks', taskRoute)
		.route('/api/hardware', hardwareRoute);

	app.notFound((context) => context.json({ error: 'not_found', message: `No route for ${context.req.method} ${context.req.path}` }, 404));

	app.onError((error, context) => {
		if (error instanceof AppError) {
			if (error.status >= 500) {
				log.error({ err: error }, error.message);
			}
			return context.json(error.toJSON(), error.status);
		}
		// 不正な JSON ボディなど Hono 側で弾かれたもの
		if (error instanceof HTTPException) {
			return context.json({ error: 'invalid_request', message: error.message }, error.status);
		}
		log.error({ err: error }, 'unhandled error');
		return context.json({ error: 'internal_error', message: 'Internal server error' }, 500);
	});

	return app;
}
