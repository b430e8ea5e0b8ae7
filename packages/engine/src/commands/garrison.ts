import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { type Board, count, flip, isBlockaded, move, spendResources } from "../board";
import {
	FORT_PAT,
	MAX_FNI,
	MILITIA_A,
	MILITIA_U,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	TORY,
} from "../constants";
import { britishPieces, rebellionPieces, royalistPieces } from "../control";
import { isAdjacent, isCity, type SpaceId, SPACE_IDS } from "../map";

export type GarrisonMove = { src: SpaceId; dst: SpaceId; n: number };

export type GarrisonRequest = {
	moves: GarrisonMove[];
	/** A Limited Garrison activates Militia only in its single destination. */
	limited?: boolean;
	/** Push every Rebellion unit out of a British-controlled City. */
	displace?: { city: SpaceId; target: SpaceId };
};

export const GARRISON_COST = 2;

const DISPLACED = [REGULAR_PAT, REGULAR_FRE, MILITIA_U, MILITIA_A] as const;

export function garrison(board: Board, request: GarrisonRequest, ctx: ActionContext): ActionResult {
	if (board.fni === MAX_FNI) return reject("not_available", "Garrison is unavailable at FNI 3");
	const moves = request.moves.filter((m) => m.n > 0);
	if (moves.length === 0) return illegal("Garrison must move at least one Regular");

	const outgoing = new Map<SpaceId, number>();
	const incoming = new Map<SpaceId, number>();
	for (const m of moves) {
		if (!isCity(m.dst)) return illegal(`${m.dst} is not a City`);
		if (isBlockaded(board, m.dst)) return illegal(`${m.dst} is Blockaded`);
		if (isBlockaded(board, m.src)) return illegal(`${m.src} is Blockaded`);
		if (m.src === m.dst) return illegal("Garrison source and destination must differ");
		outgoing.set(m.src, (outgoing.get(m.src) ?? 0) + m.n);
		incoming.set(m.dst, (incoming.get(m.dst) ?? 0) + m.n);
	}
	for (const [src, n] of outgoing) {
		if (count(board, src, REGULAR_BRI) < n) return illegal(`Only ${count(board, src, REGULAR_BRI)} Regulars in ${src}`);
	}
	const destinations = [...incoming.keys()].sort();
	if (request.limited && destinations.length !== 1) return illegal("Limited Garrison must end in a single City");

	const displace = request.displace;
	if (displace) {
		const { city, target } = displace;
		if (request.limited && city !== destinations[0]) {
			return illegal("Limited Garrison displaces only from its destination");
		}
		if (!isCity(city) || isBlockaded(board, city)) return illegal(`Cannot displace from ${city}`);
		if (!isAdjacent(city, target)) return illegal(`${target} is not adjacent to ${city}`);
		if (count(board, city, FORT_PAT) > 0) return illegal("Cannot displace from a City with a Patriot Fort");
		const delta = (incoming.get(city) ?? 0) - (outgoing.get(city) ?? 0);
		const royalists = royalistPieces(board, city) + delta;
		if (!(royalists > rebellionPieces(board, city) && britishPieces(board, city) + delta > 0)) {
			return illegal(`${city} must be under British Control to displace`);
		}
	}
	if (board.resources.BRITISH < GARRISON_COST) {
		return reject("insufficient_resources", "Garrison costs 2 Resources");
	}

	const mark = beginAction(board);
	spendResources(board, "BRITISH", GARRISON_COST);
	for (const m of moves) move(board, m.src, m.dst, REGULAR_BRI, m.n);

	const cities = request.limited
		? destinations
		: SPACE_IDS.filter((id) => isCity(id) && !isBlockaded(board, id));
	for (const city of cities) {
		const cubes = count(board, city, REGULAR_BRI) + count(board, city, TORY);
		const flips = Math.min(Math.floor(cubes / 3), count(board, city, MILITIA_U));
		if (flips > 0) flip(board, city, MILITIA_U, MILITIA_A, flips);
	}

	if (displace) {
		for (const tag of DISPLACED) {
			const n = count(board, displace.city, tag);
			if (n > 0) move(board, displace.city, displace.target, tag, n);
		}
	}

	const spaces = displace ? [...new Set([...destinations, displace.city])].sort() : destinations;
	return completeAction(board, ctx, { kind: "command", name: "GARRISON", faction: "BRITISH", spaces }, mark, {
		cost: GARRISON_COST,
	});
}
