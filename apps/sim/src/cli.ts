import { readFileSync, writeFileSync } from "node:fs";
import { InvariantViolation } from "@liberty/engine";
import minimist from "minimist";
import { parseScenario } from "./cards";
import { type LogLevel, log, setLogLevel } from "./obs/log";
import { runGame } from "./sequencer";
import { createSimulationOptions, type SimulationOptions } from "./simulation/config";

type Args = ReturnType<typeof minimist>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function printUsageAndExit(): never {
	console.error("Usage:");
	console.error("  tsx apps/sim/src/cli.ts --seed 1 --max-cards 200 --scenario ./scenario.json");
	console.error("");
	console.error("Options:");
	console.error("  --seed N             Seed for the session RNG (default: 42)");
	console.error("  --max-cards N        Stop after N cards (default: 200)");
	console.error("  --scenario PATH      Scenario JSON (default: the bundled 1775 setup)");
	console.error("  --log-level LEVEL    debug, info, warn or error (default: info)");
	console.error("  --history-out PATH   Write the turn history as JSON");
	process.exit(1);
}

function stringArg(argv: Args, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = argv[key];
		if (typeof value === "string") {
			return value;
		}
	}
	return undefined;
}

function logLevelArg(argv: Args): LogLevel | undefined {
	const value = stringArg(argv, "log-level", "logLevel");
	if (value === undefined) return undefined;
	const level = LOG_LEVELS.find((l) => l === value);
	if (level === undefined) throw new Error(`Unknown log level: ${value}`);
	return level;
}

function num(v: unknown, def: number) {
	const n =
		typeof v === "string" ? Number(v) : typeof v === "number" ? v : Number.NaN;
	return Number.isFinite(n) ? n : def;
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2));
	if (argv.help || argv.h) printUsageAndExit();

	const partial: Partial<SimulationOptions> = {
		seed: num(argv.seed, 42),
		maxCards: num(argv["max-cards"] ?? argv.maxCards, 200),
	};
	const scenarioPath = stringArg(argv, "scenario");
	if (scenarioPath !== undefined) partial.scenario = scenarioPath;
	const logLevel = logLevelArg(argv);
	if (logLevel !== undefined) partial.logLevel = logLevel;
	const historyOut = stringArg(argv, "history-out", "historyOut");
	if (historyOut !== undefined) partial.historyOut = historyOut;

	const options = createSimulationOptions(partial);
	setLogLevel(options.logLevel);

	const scenario = parseScenario(JSON.parse(readFileSync(options.scenario, "utf8")));
	log("info", "game start", { scenario: scenario.name, seed: options.seed, maxCards: options.maxCards });
	const result = runGame({ scenario, seed: options.seed, maxCards: options.maxCards });

	if (options.historyOut) {
		writeFileSync(options.historyOut, JSON.stringify(result.turns, null, 2));
	}
	console.log(
		JSON.stringify({
			seed: result.seed,
			cardsPlayed: result.cardsPlayed,
			reason: result.reason,
			winners: result.winners,
			winner: result.finalScore.winner,
			resources: result.resources,
		}),
	);
}

main().catch((e) => {
	if (e instanceof InvariantViolation) {
		log("error", "invariant violation", { operation: e.operation, location: e.location, error: e.message });
	} else {
		console.error(e);
	}
	process.exit(1);
});
