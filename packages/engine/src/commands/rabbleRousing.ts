import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
	reject,
} from "../actions";
import { type Board, count, countAll, flip, hasMarker, placeMarker, shiftSupport, spendResources } from "../board";
import { FORT_PAT, MILITIA_A, MILITIA_U, PROPAGANDA, REGULAR_PAT } from "../constants";
import { control } from "../control";
import type { SpaceId } from "../map";

export type RabbleRousingRequest = {
	spaces: SpaceId[];
};

const PATRIOT_PIECES = [REGULAR_PAT, MILITIA_A, MILITIA_U, FORT_PAT] as const;

/** Rebellion Control with a Patriot piece; such spaces rouse without revealing Militia. */
function heldByPatriots(board: Board, space: SpaceId): boolean {
	return control(board, space) === "REBELLION" && countAll(board, space, PATRIOT_PIECES) > 0;
}

export function canRabbleRouseIn(board: Board, space: SpaceId): boolean {
	return heldByPatriots(board, space) || count(board, space, MILITIA_U) > 0;
}

export function rabbleRousing(board: Board, request: RabbleRousingRequest, ctx: ActionContext): ActionResult {
	const { spaces } = request;
	if (spaces.length === 0) return illegal("Rabble-Rousing needs at least one space");
	if (hasDuplicates(spaces)) return illegal("Rabble-Rousing spaces must be distinct");
	for (const space of spaces) {
		if (!canRabbleRouseIn(board, space)) return illegal(`${space} is not eligible for Rabble-Rousing`);
	}
	const cost = spaces.length;
	if (board.resources.PATRIOTS < cost) {
		return reject("insufficient_resources", `Patriots need ${cost} Resources to Rabble-Rouse`);
	}

	// Eligibility is fixed before any shift changes who holds the space.
	const revealing = spaces.filter((space) => !heldByPatriots(board, space));

	const mark = beginAction(board);
	spendResources(board, "PATRIOTS", cost);
	for (const space of spaces) {
		if (board.markers[PROPAGANDA].pool > 0 && !hasMarker(board, PROPAGANDA, space)) {
			placeMarker(board, PROPAGANDA, space);
		}
		shiftSupport(board, space, -1);
		if (revealing.includes(space)) flip(board, space, MILITIA_U, MILITIA_A, 1);
	}

	return completeAction(board, ctx, { kind: "command", name: "RABBLE_ROUSING", faction: "PATRIOTS", spaces }, mark, {
		cost,
	});
}
