import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
	reject,
} from "../actions";
import { type Board, gainResources, hasMarker, placeMarker, removeMarker, setFni } from "../board";
import { BLOCKADE, type Faction, MAX_FNI } from "../constants";
import { rollD3 } from "../dice";
import { isCity, type SpaceId } from "../map";

export type NavalPressureRequest = {
	faction: Faction;
	/** British: the City losing its Blockade. French: the City receiving one. */
	city?: SpaceId;
	/** French with no Blockade left in the West Indies: Cities to hold the Blockades. */
	rearrange?: SpaceId[];
};

export function blockadedCities(board: Board): SpaceId[] {
	return [...board.markers[BLOCKADE].onMap].sort();
}

export function navalPressure(board: Board, request: NavalPressureRequest, ctx: ActionContext): ActionResult {
	if (request.faction === "BRITISH") return britishPressure(board, request, ctx);
	if (request.faction === "FRENCH") return frenchPressure(board, request, ctx);
	return illegal(`${request.faction} cannot apply Naval Pressure`);
}

function britishPressure(board: Board, request: NavalPressureRequest, ctx: ActionContext): ActionResult {
	const meta = { kind: "special", name: "NAVAL_PRESSURE", faction: "BRITISH" } as const;
	if (!board.toaPlayed || board.fni === 0) {
		const mark = beginAction(board);
		const gained = gainResources(board, "BRITISH", rollD3(ctx.rng));
		return completeAction(board, ctx, { ...meta, spaces: [] }, mark, { gained });
	}

	const city = request.city ?? blockadedCities(board)[0];
	if (city === undefined) return illegal("No City holds a Blockade");
	if (!hasMarker(board, BLOCKADE, city)) return illegal(`${city} has no Blockade`);

	const mark = beginAction(board);
	setFni(board, board.fni - 1);
	removeMarker(board, BLOCKADE, city);
	return completeAction(board, ctx, { ...meta, spaces: [city] }, mark, { fni: board.fni });
}

function frenchPressure(board: Board, request: NavalPressureRequest, ctx: ActionContext): ActionResult {
	const meta = { kind: "special", name: "NAVAL_PRESSURE", faction: "FRENCH" } as const;
	if (!board.toaPlayed) return reject("not_available", "French Naval Pressure needs the Treaty of Alliance");
	const blockades = board.markers[BLOCKADE];
	const inPlay = blockades.pool + blockades.onMap.size;
	if (board.fni >= Math.min(MAX_FNI, inPlay)) return illegal(`FNI cannot rise above ${Math.min(MAX_FNI, inPlay)}`);

	if (blockades.pool > 0) {
		const city = request.city;
		if (city === undefined || !isCity(city)) return illegal("French must name a City for the Blockade");
		if (hasMarker(board, BLOCKADE, city)) return illegal(`${city} is already Blockaded`);
		const mark = beginAction(board);
		setFni(board, board.fni + 1);
		placeMarker(board, BLOCKADE, city);
		return completeAction(board, ctx, { ...meta, spaces: [city] }, mark, { fni: board.fni });
	}

	const targets = request.rearrange ?? [];
	if (targets.length !== blockades.onMap.size) {
		return illegal(`Rearranging needs ${blockades.onMap.size} Cities`);
	}
	if (hasDuplicates(targets) || !targets.every(isCity)) return illegal("Blockades go to distinct Cities");

	const mark = beginAction(board);
	setFni(board, board.fni + 1);
	for (const city of blockadedCities(board)) removeMarker(board, BLOCKADE, city);
	for (const city of targets) placeMarker(board, BLOCKADE, city);
	return completeAction(board, ctx, { ...meta, spaces: [...targets].sort() }, mark, { fni: board.fni });
}
