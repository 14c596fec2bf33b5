/**
 * Destination for the library's log output. Every message arrives already
 * prefixed with `[unible:<scope>]`, so any console-shaped object fits.
 */
export interface Logger {
	/** Without it, debug output goes to the console once debug logging is enabled */
	debug?(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

const LOG_PREFIX = "unible";

const consoleLogger: Logger = {
	warn: (msg, ...args) => console.warn(msg, ...args),
	error: (msg, ...args) => console.error(msg, ...args),
};

let sink: Logger = consoleLogger;
let debugToConsole = false;

/** The logger installed with `setLogger()`, or the console one */
export function getLogger(): Logger {
	return sink;
}

/** Routes all library output, from modules loaded earlier too, to `logger`. */
export function setLogger(logger: Logger): void {
	sink = logger;
}

/** Back to console output with debug logging off. */
export function resetLogger(): void {
	sink = consoleLogger;
	debugToConsole = false;
}

/**
 * Sends debug messages to `console.debug` when the installed logger has no
 * `debug` method of its own. Set by `UNIBLE_DEBUG` or the client's `debug`.
 */
export function enableDebugLogging(): void {
	debugToConsole = true;
}

export interface ScopedLogger {
	debug(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

function debugSink(): ((message: string, ...args: unknown[]) => void) | undefined {
	if (sink.debug) {
		return sink.debug.bind(sink);
	}
	return debugToConsole ? console.debug : undefined;
}

/**
 * A logger bound to one module. The target is looked up on every call, so
 * a module-level `const log = createScopedLogger("scanner")` follows later
 * `setLogger()` calls.
 */
export function createScopedLogger(scope: string): ScopedLogger {
	const prefix = `[${LOG_PREFIX}:${scope}]`;
	return {
		debug: (msg, ...args) => debugSink()?.(`${prefix} ${msg}`, ...args),
		warn: (msg, ...args) => sink.warn(`${prefix} ${msg}`, ...args),
		error: (msg, ...args) => sink.error(`${prefix} ${msg}`, ...args),
	};
}
