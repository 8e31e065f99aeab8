import pino, { type Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string | undefined): value is LogLevel => LOG_LEVELS.some((level) => level === value);

// ルートロガーは import 時に作る
// テスト中（NODE_ENV=test）は LOG_LEVEL がなければ何も出さない
const envLevel = process.env.LOG_LEVEL;
const level: LogLevel = isLogLevel(envLevel) ? envLevel : process.env.NODE_ENV === 'test' ? 'silent' : 'info';

const rootLogger: Logger = pino({
	level,
	formatters: {
		level: (label: string) => ({ level: label.toUpperCase() }),
	},
	timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * サブシステム名つきの子ロガーを返す（例: getLogger('scan')）。
 */
export function getLogger(subsystem: string): Logger {
	return rootLogger.child({ subsystem });
}

export function flushLogger(): void {
	rootLogger.flush();
}
