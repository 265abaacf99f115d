import zod from "zod";

/**
 * Logging flags shared by every command.
 *
 * The core package creates its loggers as soon as it is imported, which
 * happens before Pastel parses the options, so cli.tsx reads these flags from
 * argv into the environment first. The schema lets Pastel accept and
 * document them.
 */
export const loggingOptions = {
	loglevel: zod
		.enum(["trace", "debug", "info", "warn", "error", "fatal"])
		.optional()
		.describe("Log verbosity (warn unless given)"),
	logoutput: zod
		.string()
		.optional()
		.describe("File receiving the log lines instead of stderr"),
	quiet: zod.boolean().default(false).describe("Turn logging off"),
};

function flagValue(argv: readonly string[], name: string): string | undefined {
	const flag = `--${name}`;
	for (const [position, arg] of argv.entries()) {
		if (arg === flag) return argv[position + 1];
		if (arg.startsWith(`${flag}=`)) return arg.slice(flag.length + 1);
	}
	return undefined;
}

/**
 * Environment entries for the core logger configuration
 */
export function loggingEnv(argv: readonly string[]): Record<string, string> {
	const env: Record<string, string> = {};

	const level = loggingOptions.loglevel.safeParse(flagValue(argv, "loglevel"));
	if (level.success && level.data !== undefined) {
		env["CLI_LOG_LEVEL"] = level.data;
	}
	const output = flagValue(argv, "logoutput");
	if (output !== undefined) {
		env["LOG_OUTPUT"] = output;
	}
	if (argv.includes("--quiet")) {
		env["CLI_LOG_LEVEL"] = "silent";
	}

	return env;
}
