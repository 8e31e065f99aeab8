import { serve } from '@hono/node-server';
import { createApp, createServices } from './app';
import { loadConfig } from './config';
import { LedStatusSink } from './Hardware/LedStatusSink';
import { dispatchToSink, NoopStatusSink, type StatusSink } from './Hardware/StatusSink';
import { SysfsGpio } from './Hardware/SysfsGpio';
import { flushLogger, getLogger } from './logger';
import { FileJsonStorage } from './Storage/FileJsonStorage';

const config = loadConfig();
const log = getLogger('server');

// GPIO が無効なときは LED に何も出さない
const sink: StatusSink = config.gpio.enabled
	? new LedStatusSink(new SysfsGpio(config.gpio.root), config.gpio.ledPins)
	: new NoopStatusSink();

const services = createServices({
	storage: new FileJsonStorage(config.dataDir),
	sink,
	auth: { authToken: config.authToken, nfcPublic: config.nfcPublic },
});

const app = createApp(services, { corsOrigins: config.corsOrigins });

const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
	log.info({ address: info.address, port: info.port, dataDir: config.dataDir, hardware: sink.enabled, logLevel: config.logLevel }, 'task tracker listening');
});

// 起動時に保存済みの状態を LED に反映する
dispatchToSink('initial LED sync', async () => sink.sync(await services.tasks.list()));

const shutdown = (signal: string) => {
	log.info({ signal }, 'shutting down');
	server.close(() => {
		void sink
			.close()
			.catch((error: unknown) => log.warn({ err: error }, 'LED cleanup failed'))
			.finally(() => {
				flushLogger();
				process.exit(0);
			});
	});
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
