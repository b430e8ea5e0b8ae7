import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
	reject,
} from "../actions";
import { bases, type Board, count, flip, move, place, poolCount, remove, spendResources } from "../board";
import {
	MAX_BASES_PER_SPACE,
	NEUTRAL,
	PASSIVE_OPPOSITION,
	PASSIVE_SUPPORT,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
} from "../constants";
import { leaderModifiers } from "../leaders";
import { isAdjacent, isProvince, isReserve, type SpaceId } from "../map";

export type GatherMove = { src: SpaceId; dst: SpaceId; n: number };

export type GatherRequest = {
	spaces: SpaceId[];
	buildVillage?: SpaceId[];
	/** Up to Villages + 1 War Parties where a Village already stands. */
	bulkPlace?: Record<SpaceId, number>;
	moves?: GatherMove[];
};

const GATHER_LEVELS: readonly number[] = [PASSIVE_SUPPORT, NEUTRAL, PASSIVE_OPPOSITION];

function warParties(board: Board, space: SpaceId): number {
	return count(board, space, WARPARTY_U) + count(board, space, WARPARTY_A);
}

export function canGatherIn(board: Board, space: SpaceId): boolean {
	return isProvince(space) && GATHER_LEVELS.includes(board.support[space] ?? 0);
}

export function gather(board: Board, request: GatherRequest, ctx: ActionContext): ActionResult {
	const { spaces } = request;
	const buildVillage = request.buildVillage ?? [];
	const bulkPlace = request.bulkPlace ?? {};
	const moves = (request.moves ?? []).filter((m) => m.n > 0);

	if (spaces.length === 0) return illegal("Gather needs at least one Province");
	if (hasDuplicates(spaces)) return illegal("Gather Provinces must be distinct");
	for (const space of spaces) {
		if (!canGatherIn(board, space)) return illegal(`${space} is not an eligible Province for Gather`);
	}
	for (const space of [...buildVillage, ...Object.keys(bulkPlace)]) {
		if (!spaces.includes(space)) return illegal(`${space} is not a Gather Province`);
	}

	const placed = new Map<SpaceId, number>();
	const villageCost = new Map<SpaceId, number>();
	for (const space of spaces) {
		if (buildVillage.includes(space)) {
			const needed = leaderModifiers(board, "gather", space).villageWarPartyCost;
			if (warParties(board, space) < needed) return illegal(`A Village in ${space} needs ${needed} War Parties`);
			if (bases(board, space) >= MAX_BASES_PER_SPACE) return illegal(`${space} has no room for a Village`);
			villageCost.set(space, needed);
			continue;
		}
		const bulk = bulkPlace[space];
		if (bulk !== undefined) {
			const villages = count(board, space, VILLAGE);
			if (villages === 0) return illegal(`${space} has no Village`);
			if (bulk < 0 || bulk > villages + 1) return illegal(`At most ${villages + 1} War Parties in ${space}`);
			placed.set(space, bulk);
			continue;
		}
		placed.set(space, 1);
	}
	if (villageCost.size > poolCount(board, "available", VILLAGE)) return reject("not_available", "No Villages available");
	const needed = [...placed.values()].reduce((a, b) => a + b, 0);
	if (needed > poolCount(board, "available", WARPARTY_U)) {
		return reject("not_available", `Only ${poolCount(board, "available", WARPARTY_U)} War Parties available`);
	}

	const outgoing = new Map<SpaceId, number>();
	const destinations = new Set<SpaceId>();
	for (const m of moves) {
		if (!spaces.includes(m.dst)) return illegal(`${m.dst} is not a Gather Province`);
		if (!isAdjacent(m.src, m.dst)) return illegal(`${m.src} is not adjacent to ${m.dst}`);
		if (count(board, m.dst, VILLAGE) === 0) return illegal(`${m.dst} needs a Village to gather War Parties`);
		outgoing.set(m.src, (outgoing.get(m.src) ?? 0) + m.n);
		destinations.add(m.dst);
	}
	for (const [src, n] of outgoing) {
		if (warParties(board, src) < n) return illegal(`Only ${warParties(board, src)} War Parties in ${src}`);
	}

	const freeReserve = spaces.some(isReserve);
	const cost = spaces.length - (freeReserve ? 1 : 0);
	if (board.resources.INDIANS < cost) {
		return reject("insufficient_resources", `Indians need ${cost} Resources to Gather`);
	}

	const mark = beginAction(board);
	spendResources(board, "INDIANS", cost);

	for (const [space, n] of villageCost) {
		const underground = Math.min(n, count(board, space, WARPARTY_U));
		remove(board, space, WARPARTY_U, underground);
		remove(board, space, WARPARTY_A, n - underground);
		place(board, space, VILLAGE, 1);
	}
	for (const [space, n] of placed) place(board, space, WARPARTY_U, n);

	for (const m of moves) {
		const underground = Math.min(m.n, count(board, m.src, WARPARTY_U));
		move(board, m.src, m.dst, WARPARTY_U, underground);
		move(board, m.src, m.dst, WARPARTY_A, m.n - underground, WARPARTY_U);
	}
	for (const dst of destinations) {
		const active = count(board, dst, WARPARTY_A);
		if (active > 0) flip(board, dst, WARPARTY_A, WARPARTY_U, active);
	}

	return completeAction(board, ctx, { kind: "command", name: "GATHER", faction: "INDIANS", spaces }, mark, {
		cost,
	});
}
