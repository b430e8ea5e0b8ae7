import { fileURLToPath } from "node:url";
import { FACTIONS, type Faction } from "@liberty/engine";
import { z } from "zod";
import type { LogLevel } from "../obs/log";

/** Configuration for one simulated game */
export interface SimulationOptions {
	/** Seed for the session RNG */
	seed: number;
	/** Stop after this many cards even if the deck has more */
	maxCards: number;
	/** Factions played by a human decider instead of a bot */
	humans: Faction[];
	/** Path to the scenario JSON file */
	scenario: string;
	logLevel: LogLevel;
	/** Where to write the turn history as JSON, if anywhere */
	historyOut?: string;
}

export const DEFAULT_SCENARIO = fileURLToPath(new URL("../../data/scenarios/1775.json", import.meta.url));

/** Schema for validating simulation options */
export const SimulationOptionsSchema = z.object({
	seed: z.number().int("seed must be an integer"),
	maxCards: z.number().int().positive("maxCards must be a positive number"),
	humans: z
		.array(z.enum(FACTIONS))
		.refine((humans) => new Set(humans).size === humans.length, "humans must not repeat a faction"),
	scenario: z.string().min(1, "scenario cannot be empty"),
	logLevel: z.enum(["debug", "info", "warn", "error"]),
	historyOut: z.string().min(1, "historyOut cannot be empty").optional(),
});

/** Default configuration values */
export const defaultSimulationOptions: SimulationOptions = {
	seed: 42,
	maxCards: 200,
	humans: [],
	scenario: DEFAULT_SCENARIO,
	logLevel: "info",
};

/**
 * Creates a full SimulationOptions from partial options, applying defaults
 */
export function createSimulationOptions(
	options: Partial<SimulationOptions> = {},
): SimulationOptions {
	const merged = {
		...defaultSimulationOptions,
		...options,
	};

	const result = SimulationOptionsSchema.safeParse(merged);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid simulation options: ${errors}`);
	}

	return merged;
}
