import { settings } from "../config/settings";

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

function enabled(level: Level): boolean {
	return LEVEL_ORDER[level] >= LEVEL_ORDER[settings.logLevel];
}

export function describeError(error: unknown): Record<string, unknown> {
	if (error instanceof Error) {
		return {
			error: error.message,
			errorName: error.name,
			...(error.cause !== undefined ? { cause: String(error.cause) } : {}),
		};
	}
	return { error: String(error) };
}

function write(level: Level, msg: string, meta?: object): void {
	if (!enabled(level)) {
		return;
	}
	const line = JSON.stringify({
		level,
		message: msg,
		...meta,
		timestamp: Date.now(),
	});
	if (level === "error") {
		console.error(line);
	} else if (level === "warn") {
		console.warn(line);
	} else {
		console.log(line);
	}
}

export const logger = {
	debug: (msg: string, meta?: object) => write("debug", msg, meta),
	info: (msg: string, meta?: object) => write("info", msg, meta),
	warn: (msg: string, meta?: object) => write("warn", msg, meta),
	error: (msg: string, error?: unknown, meta?: object) =>
		write("error", msg, {
			...meta,
			...(error === undefined ? {} : describeError(error)),
		}),
};
