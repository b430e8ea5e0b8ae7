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
import { ACTIVE_SUPPORT, FORT_PAT, MAX_BASES_PER_SPACE, MILITIA_A, MILITIA_U, REGULAR_PAT } from "../constants";
import { isAdjacent, isReserve, isWestIndies, population, type SpaceId } from "../map";

export type RallyMove = { src: SpaceId; dst: SpaceId; n: number };

export type RallyRequest = {
	spaces: SpaceId[];
	/** Replace 2 Patriot units with a Fort here (Underground, then Active Militia, then Continentals). */
	buildFort?: SpaceId[];
	/** Up to Forts + population Militia where a Fort already stands. */
	bulkPlace?: Record<SpaceId, number>;
	/** Militia gathered into Fort spaces from adjacent spaces. */
	moves?: RallyMove[];
	/** Fort space whose Militia become Continentals. */
	promote?: SpaceId;
};

function militia(board: Board, space: SpaceId): number {
	return count(board, space, MILITIA_U) + count(board, space, MILITIA_A);
}

function canPlaceMilitia(space: SpaceId): boolean {
	return !isReserve(space) && !isWestIndies(space);
}

export function rally(board: Board, request: RallyRequest, ctx: ActionContext): ActionResult {
	const { spaces } = request;
	const buildFort = request.buildFort ?? [];
	const bulkPlace = request.bulkPlace ?? {};
	const moves = (request.moves ?? []).filter((m) => m.n > 0);

	if (spaces.length === 0) return illegal("Rally needs at least one space");
	if (hasDuplicates(spaces)) return illegal("Rally spaces must be distinct");
	for (const space of spaces) {
		if ((board.support[space] ?? 0) === ACTIVE_SUPPORT) return illegal(`${space} is at Active Support`);
	}

	const placed = new Map<SpaceId, number>();
	for (const space of spaces) {
		const hasFort = count(board, space, FORT_PAT) > 0;
		if (buildFort.includes(space)) {
			if (hasFort) return illegal(`${space} already has a Patriot Fort`);
			if (bases(board, space) >= MAX_BASES_PER_SPACE) return illegal(`${space} has no room for a Fort`);
			if (militia(board, space) + count(board, space, REGULAR_PAT) < 2) {
				return illegal(`A Fort in ${space} needs 2 Patriot units`);
			}
			continue;
		}
		const bulk = bulkPlace[space];
		if (bulk !== undefined) {
			if (!hasFort) return illegal(`Placing several Militia in ${space} needs a Fort`);
			const limit = count(board, space, FORT_PAT) + population(space);
			if (bulk < 0 || bulk > limit) return illegal(`At most ${limit} Militia in ${space}`);
			if (!canPlaceMilitia(space)) return illegal(`No Militia may be placed in ${space}`);
			placed.set(space, bulk);
			continue;
		}
		if (!hasFort) {
			if (!canPlaceMilitia(space)) return illegal(`No Militia may be placed in ${space}`);
			placed.set(space, 1);
		}
	}
	for (const space of [...buildFort, ...Object.keys(bulkPlace)]) {
		if (!spaces.includes(space)) return illegal(`${space} is not a Rally space`);
	}
	const fortsNeeded = buildFort.length;
	if (fortsNeeded > poolCount(board, "available", FORT_PAT)) return reject("not_available", "No Patriot Forts available");
	const militiaNeeded = [...placed.values()].reduce((a, b) => a + b, 0);
	if (militiaNeeded > poolCount(board, "available", MILITIA_U)) {
		return reject("not_available", `Only ${poolCount(board, "available", MILITIA_U)} Militia available`);
	}

	const pairs = moves.map((m) => `${m.src}>${m.dst}`);
	if (hasDuplicates(pairs)) return illegal("Each source may feed a destination once");
	const outgoing = new Map<SpaceId, number>();
	const incoming = new Map<SpaceId, number>();
	for (const m of moves) {
		if (!spaces.includes(m.dst)) return illegal(`${m.dst} is not a Rally space`);
		if (count(board, m.dst, FORT_PAT) === 0) return illegal(`${m.dst} needs a Fort to gather Militia`);
		if (!isAdjacent(m.src, m.dst)) return illegal(`${m.src} is not adjacent to ${m.dst}`);
		outgoing.set(m.src, (outgoing.get(m.src) ?? 0) + m.n);
		incoming.set(m.dst, (incoming.get(m.dst) ?? 0) + m.n);
	}
	for (const [src, n] of outgoing) {
		if (militia(board, src) < n) return illegal(`Only ${militia(board, src)} Militia in ${src}`);
	}

	let promoteN = 0;
	if (request.promote) {
		const space = request.promote;
		if (!spaces.includes(space)) return illegal("Promotion must be in a Rally space");
		if (count(board, space, FORT_PAT) === 0 && !buildFort.includes(space)) {
			return illegal("Promotion needs a Fort");
		}
		const fortCost = buildFort.includes(space) ? Math.min(2, militia(board, space)) : 0;
		const expected =
			militia(board, space) + (placed.get(space) ?? 0) + (incoming.get(space) ?? 0) - (outgoing.get(space) ?? 0) - fortCost;
		promoteN = Math.min(expected, poolCount(board, "available", REGULAR_PAT));
		if (promoteN <= 0) return illegal("No Militia to promote or no Continentals available");
	}

	const cost = spaces.length;
	if (board.resources.PATRIOTS < cost) {
		return reject("insufficient_resources", `Patriots need ${cost} Resources to Rally`);
	}

	const mark = beginAction(board);
	spendResources(board, "PATRIOTS", cost);

	for (const space of buildFort) {
		let needed = 2;
		for (const tag of [MILITIA_U, MILITIA_A, REGULAR_PAT]) {
			const take = Math.min(needed, count(board, space, tag));
			remove(board, space, tag, take);
			needed -= take;
		}
		place(board, space, FORT_PAT, 1);
	}
	for (const [space, n] of placed) place(board, space, MILITIA_U, n);

	for (const m of moves) {
		const underground = Math.min(m.n, count(board, m.src, MILITIA_U));
		move(board, m.src, m.dst, MILITIA_U, underground);
		move(board, m.src, m.dst, MILITIA_A, m.n - underground, MILITIA_U);
	}
	for (const dst of incoming.keys()) {
		const active = count(board, dst, MILITIA_A);
		if (active > 0) flip(board, dst, MILITIA_A, MILITIA_U, active);
	}

	if (request.promote && promoteN > 0) {
		const space = request.promote;
		const fromActive = Math.min(promoteN, count(board, space, MILITIA_A));
		remove(board, space, MILITIA_A, fromActive);
		remove(board, space, MILITIA_U, promoteN - fromActive);
		place(board, space, REGULAR_PAT, promoteN);
	}

	return completeAction(board, ctx, { kind: "command", name: "RALLY", faction: "PATRIOTS", spaces }, mark, {
		cost,
		promoted: promoteN,
	});
}
