import {
	type ActionContext,
	type ActionResult,
	type Board,
	type BoardSnapshotInput,
	boardFromSnapshot,
	createActionContext,
	type Faction,
	type Rng,
} from "@liberty/engine";

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

export function makeContext(values: readonly number[] = [0], humans: readonly Faction[] = []): ActionContext {
	return createActionContext(scriptedRng(values), humans);
}

/** Unwraps a successful result or fails the test with the rejection. */
export function expectOk(result: ActionResult) {
	if (!result.ok) throw new Error(`expected success, got ${result.reason}: ${result.error}`);
	return result.outcome;
}
