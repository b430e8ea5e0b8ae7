import {
	type Board,
	type BoardSnapshotInput,
	boardFromSnapshot,
	createActionContext,
	type Faction,
	type Rng,
} from "@liberty/engine";
import { type Card, CardSchema } from "../src/cards";
import { FIRST_SLOT } from "../src/sequencer";
import type { SlotOptions, TurnInput } from "../src/types";

export const NO_RESOURCES: Record<Faction, number> = { BRITISH: 0, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 };

export function makeBoard(overrides: Partial<BoardSnapshotInput> = {}): Board {
	return boardFromSnapshot({ spaces: {}, resources: NO_RESOURCES, ...overrides });
}

/** Replays `values` in order, then repeats the last one. */
export function scriptedRng(values: readonly number[]): Rng {
	let i = 0;
	return () => {
		const value = values[Math.min(i, values.length - 1)] ?? 0;
		i += 1;
		return value;
	};
}

export function makeCard(id: number, extra: Partial<Card> = {}): Card {
	return CardSchema.parse({ id, ...extra });
}

export function makeInput(
	board: Board,
	faction: Faction,
	opts: { card?: Card; slot?: SlotOptions; rolls?: readonly number[] } = {},
): TurnInput {
	return {
		board,
		faction,
		card: opts.card ?? makeCard(5, { sword: true }),
		slot: opts.slot ?? FIRST_SLOT,
		ctx: createActionContext(scriptedRng(opts.rolls ?? [0])),
	};
}
