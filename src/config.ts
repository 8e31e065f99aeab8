import z from 'zod';
import type { RgbPins } from './Hardware/StatusSink';
import { LOG_LEVELS, type LogLevel } from './logger';

export interface AppConfig {
	authToken: string;
	nfcPublic: boolean;
	dataDir: string;
	host: string;
	port: number;
	logLevel: LogLevel;
	corsOrigins: string[];
	gpio: {
		enabled: boolean;
		root: string;
		ledPins: RgbPins[];
	};
}

// 1 / true / 0 / false（大文字小文字は問わない）
const flag = z
	.string()
	.trim()
	.toLowerCase()
	.pipe(z.enum(['1', 'true', '0', 'false']))
	.transform((value) => value === '1' || value === 'true');

// "17,27,22;23,24,25" → [{ r: 17, g: 27, b: 22 }, { r: 23, g: 24, b: 25 }]
const ledPins = z.string().transform((value, context): RgbPins[] => {
	const groups = value
		.split(';')
		.map((group) => group.trim())
		.filter(Boolean);

	const pins: RgbPins[] = [];
	for (const group of groups) {
		const numbers = group.split(',').map((part) => Number(part.trim()));
		const [r, g, b] = numbers;
		if (numbers.length !== 3 || r === undefined || g === undefined || b === undefined || !numbers.every((n) => Number.isInteger(n) && n >= 0)) {
			context.addIssue({ code: 'custom', message: `TASK_LED_PINS group "${group}" must be three pin numbers "r,g,b"` });
			return z.NEVER;
		}
		pins.push({ r, g, b });
	}
	return pins;
});

const envSchema = z.object({
	TASK_AUTH_TOKEN: z.string({ error: 'TASK_AUTH_TOKEN must be set' }).min(1, 'TASK_AUTH_TOKEN must not be empty'),
	TASK_NFC_PUBLIC: flag.default(false),
	TASK_DATA_DIR: z.string().min(1).default('data'),
	HOST: z.string().min(1).default('0.0.0.0'),
	PORT: z.coerce.number().int().min(1).max(65535).default(5002),
	LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
	CORS_ORIGINS: z
		.string()
		.default('http://localhost:5173')
		.transform((value) =>
			value
				.split(',')
				.map((origin) => origin.trim())
				.filter(Boolean)
		),
	TASK_GPIO_ENABLED: flag.default(false),
	TASK_GPIO_ROOT: z.string().min(1).default('/sys/class/gpio'),
	TASK_LED_PINS: ledPins.default([
		{ r: 17, g: 27, b: 22 },
		{ r: 23, g: 24, b: 25 },
	]),
});

/**
 * 環境変数から設定を読み込む。不正な値があれば起動時にエラーにする。
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		throw new Error(`Invalid configuration:\n${z.prettifyError(result.error)}`);
	}

	const values = result.data;
	return {
		authToken: values.TASK_AUTH_TOKEN,
		nfcPublic: values.TASK_NFC_PUBLIC,
		dataDir: values.TASK_DATA_DIR,
		host: values.HOST,
		port: values.PORT,
		logLevel: values.LOG_LEVEL,
		corsOrigins: values.CORS_ORIGINS,
		gpio: {
			enabled: values.TASK_GPIO_ENABLED,
			root: values.TASK_GPIO_ROOT,
			ledPins: values.TASK_LED_PINS,
		},
	};
}
