export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minimum: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
	minimum = level;
};

export const log = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[minimum]) return;
	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...(fields ?? {}),
	};

	const fn = console[level] ?? console.log;
	fn(JSON.stringify(payload));
};
