import {
	BoardSnapshotSchema,
	FACTIONS,
	type Faction,
	WINTER_QUARTERS_CARDS,
} from "@liberty/engine";
import { z } from "zod";

// --- Card reference data ------------------------------------------------------

export const CardSchema = z.object({
	id: z.number().int().positive(),
	title: z.string().optional(),
	/** Faction symbols left to right; the first Eligible faction acts first. */
	order: z.array(z.enum(FACTIONS)).default([]),
	/** Bots never play this Event. */
	sword: z.boolean().default(false),
	/** Shaded and unshaded sides; single-sided cards play unshaded. */
	dual: z.boolean().default(true),
});

export type Card = z.output<typeof CardSchema>;

/** Used for cards the scenario lists no reference data for. */
export const DEFAULT_ORDER: readonly Faction[] = ["BRITISH", "PATRIOTS", "INDIANS", "FRENCH"];

export function isWinterQuarters(cardId: number): boolean {
	return WINTER_QUARTERS_CARDS.includes(cardId);
}

export function factionOrder(card: Card): Faction[] {
	return card.order.length > 0 ? [...card.order] : [...DEFAULT_ORDER];
}

// --- Scenario -----------------------------------------------------------------

export const ScenarioSchema = z.object({
	name: z.string().min(1),
	board: BoardSnapshotSchema,
	cards: z.array(CardSchema).default([]),
	/** British Regulars leaving Unavailable at each Winter Quarters, in deck order. */
	britishRelease: z.array(z.number().int().nonnegative()).default([]),
});

export type Scenario = z.output<typeof ScenarioSchema>;

export function cardLookup(cards: readonly Card[]): (id: number) => Card {
	const byId = new Map(cards.map((card) => [card.id, card]));
	return (id) => byId.get(id) ?? CardSchema.parse({ id });
}

/** Parses scenario JSON, listing every zod issue on failure. */
export function parseScenario(input: unknown): Scenario {
	const result = ScenarioSchema.safeParse(input);
	if (!result.success) {
		const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
		throw new Error(`Invalid scenario: ${errors}`);
	}
	return result.data;
}
