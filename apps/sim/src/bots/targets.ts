import { type ActionContext, type ActionResult, illegal, SPACE_IDS, type SpaceId } from "@liberty/engine";
import type { TurnInput } from "../types";

export type SpaceKey = (space: SpaceId) => number;

/** Sorts by each key, highest first, then by space id. */
export function rankSpaces(spaces: readonly SpaceId[], ...keys: SpaceKey[]): SpaceId[] {
	return [...spaces].sort((a, b) => {
		for (const key of keys) {
			const diff = key(b) - key(a);
			if (diff !== 0) return diff;
		}
		return a < b ? -1 : a > b ? 1 : 0;
	});
}

export const flag = (test: (space: SpaceId) => boolean): SpaceKey => (space) => (test(space) ? 1 : 0);

export const lowest = (key: SpaceKey): SpaceKey => (space) => -key(space);

export function spacesWhere(test: (space: SpaceId) => boolean): SpaceId[] {
	return SPACE_IDS.filter(test);
}

/** How many spaces a Command may take in this slot. */
export function spaceBudget(input: TurnInput, wanted: number): number {
	return input.slot.limitedOnly ? Math.min(1, wanted) : wanted;
}

export function noTarget(rule: string): ActionResult {
	return illegal(`${rule}: no legal target`);
}

/** Spaces this turn's Command already used. */
export function commandSpaces(ctx: ActionContext): Set<SpaceId> {
	return new Set(ctx.outcomes.filter((o) => o.kind === "command").flatMap((o) => o.spaces));
}
