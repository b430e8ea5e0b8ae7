import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
} from "../actions";
import { type Board, count, countAll, gainResources, remove, spendResources } from "../board";
import { REBELLION_TAGS, WARPARTY_A, WARPARTY_U } from "../constants";
import { population, type SpaceId } from "../map";

export type PlunderRequest = {
	space: SpaceId;
};

function warParties(board: Board, space: SpaceId): number {
	return count(board, space, WARPARTY_U) + count(board, space, WARPARTY_A);
}

export function canPlunderIn(board: Board, space: SpaceId, ctx: ActionContext): boolean {
	return (
		ctx.raided.includes(space) &&
		population(space) > 0 &&
		warParties(board, space) > countAll(board, space, REBELLION_TAGS)
	);
}

export function plunder(board: Board, request: PlunderRequest, ctx: ActionContext): ActionResult {
	const { space } = request;
	if (!ctx.raided.includes(space)) return illegal(`Plunder must follow a Raid in ${space}`);
	if (population(space) === 0) return illegal(`${space} has no population to Plunder`);
	if (warParties(board, space) <= countAll(board, space, REBELLION_TAGS)) {
		return illegal(`War Parties do not outnumber the Rebellion in ${space}`);
	}

	const mark = beginAction(board);
	const taken = Math.min(population(space), board.resources.PATRIOTS);
	spendResources(board, "PATRIOTS", taken);
	gainResources(board, "INDIANS", taken);
	remove(board, space, count(board, space, WARPARTY_U) > 0 ? WARPARTY_U : WARPARTY_A, 1);

	return completeAction(board, ctx, { kind: "special", name: "PLUNDER", faction: "INDIANS", spaces: [space] }, mark, {
		taken,
	});
}
