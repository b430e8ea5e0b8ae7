import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
} from "../actions";
import { type Board, count, flip, gainResources, hasMarker, placeMarker } from "../board";
import { MILITIA_A, MILITIA_U, PROPAGANDA } from "../constants";
import { control } from "../control";
import { isCity, isColony, type SpaceId } from "../map";

export type PersuasionRequest = {
	spaces: SpaceId[];
};

export const MAX_PERSUASION_SPACES = 3;

export function canPersuadeIn(board: Board, space: SpaceId): boolean {
	return (
		(isCity(space) || isColony(space)) &&
		control(board, space) === "REBELLION" &&
		count(board, space, MILITIA_U) > 0
	);
}

export function persuasion(board: Board, request: PersuasionRequest, ctx: ActionContext): ActionResult {
	const { spaces } = request;
	if (spaces.length === 0 || spaces.length > MAX_PERSUASION_SPACES) {
		return illegal(`Persuasion selects 1 to ${MAX_PERSUASION_SPACES} spaces`);
	}
	if (hasDuplicates(spaces)) return illegal("Persuasion spaces must be distinct");
	for (const space of spaces) {
		if (!canPersuadeIn(board, space)) return illegal(`${space} is not eligible for Persuasion`);
	}

	const mark = beginAction(board);
	let gained = 0;
	let markers = 0;
	for (const space of spaces) {
		flip(board, space, MILITIA_U, MILITIA_A, 1);
		gained += gainResources(board, "PATRIOTS", 1);
		if (board.markers[PROPAGANDA].pool > 0 && !hasMarker(board, PROPAGANDA, space)) {
			placeMarker(board, PROPAGANDA, space);
			markers += 1;
		}
	}

	return completeAction(board, ctx, { kind: "special", name: "PERSUASION", faction: "PATRIOTS", spaces }, mark, {
		gained,
		markers,
	});
}
