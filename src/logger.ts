const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

type Level = keyof typeof LEVELS;

function isLevel(value: string | undefined): value is Level {
	return value !== undefined && value in LEVELS;
}

// stdout carries protocol traffic, so everything goes to stderr.
function write(level: Level, args: unknown[]): void {
	const configured = process.env.LOG_LEVEL;
	const threshold = isLevel(configured) ? LEVELS[configured] : LEVELS.info;
	if (LEVELS[level] < threshold) return;
	console.error(`[${level.toUpperCase()}]`, ...args);
}

export const logger = {
	debug: (...args: unknown[]) => write("debug", args),
	info: (...args: unknown[]) => write("info", args),
	warn: (...args: unknown[]) => write("warn", args),
	error: (...args: unknown[]) => write("error", args),
};
