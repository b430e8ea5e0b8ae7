import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { type Board, count, flip, move, type PieceCounts, spendResources } from "../board";
import {
	type ControlValue,
	type Faction,
	MILITIA_A,
	MILITIA_U,
	PIECE_TAGS,
	type PieceTag,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	TORY,
	WARPARTY_A,
	WARPARTY_U,
} from "../constants";
import { control } from "../control";
import { isAdjacent, isCity, isColony, isReserve, type SpaceId } from "../map";

export type MarchMove = {
	src: SpaceId;
	dst: SpaceId;
	pieces: PieceCounts;
};

export type MarchRequest = {
	faction: Faction;
	moves: MarchMove[];
	free?: boolean;
};

const MOVABLE: Record<Faction, readonly PieceTag[]> = {
	BRITISH: [REGULAR_BRI, TORY, WARPARTY_A, WARPARTY_U],
	PATRIOTS: [REGULAR_PAT, MILITIA_A, MILITIA_U, REGULAR_FRE],
	FRENCH: [REGULAR_FRE, REGULAR_PAT],
	INDIANS: [WARPARTY_A, WARPARTY_U],
};

function n(pieces: PieceCounts, tag: PieceTag): number {
	return pieces[tag] ?? 0;
}

function validateMove(faction: Faction, m: MarchMove, ctx: ActionContext): string | null {
	if (!isAdjacent(m.src, m.dst)) return `${m.src} is not adjacent to ${m.dst}`;
	let total = 0;
	for (const tag of PIECE_TAGS) {
		const moved = n(m.pieces, tag);
		if (moved < 0 || !Number.isInteger(moved)) return `Invalid count for ${tag}`;
		if (moved > 0 && !MOVABLE[faction].includes(tag)) return `${faction} cannot March ${tag}`;
		total += moved;
	}
	if (total === 0) return `March from ${m.src} moves no pieces`;

	switch (faction) {
		case "BRITISH": {
			const escorts = n(m.pieces, TORY) + n(m.pieces, WARPARTY_A) + n(m.pieces, WARPARTY_U);
			if (escorts > n(m.pieces, REGULAR_BRI)) return "Escort cap exceeded for British March";
			const warParties = n(m.pieces, WARPARTY_A) + n(m.pieces, WARPARTY_U);
			if (warParties > 0 && isCity(m.dst)) return "Common Cause War Parties may not move into Cities";
			if (warParties > (ctx.commonCause[m.src] ?? 0)) return `Only Common Cause War Parties may March from ${m.src}`;
			return null;
		}
		case "PATRIOTS":
			if (n(m.pieces, REGULAR_FRE) > n(m.pieces, REGULAR_PAT)) return "French escort exceeds the Continental column";
			return null;
		case "FRENCH":
			if (n(m.pieces, REGULAR_PAT) > n(m.pieces, REGULAR_FRE)) return "Continental escort exceeds the French column";
			return null;
		case "INDIANS":
			if (isCity(m.dst)) return "Indians cannot enter a City";
			return null;
	}
}

/** Pieces requested out of each source, summed across moves. */
function demandBySource(moves: readonly MarchMove[]): Map<SpaceId, PieceCounts> {
	const demand = new Map<SpaceId, PieceCounts>();
	for (const m of moves) {
		const acc = demand.get(m.src) ?? {};
		for (const tag of PIECE_TAGS) {
			const moved = n(m.pieces, tag);
			if (moved > 0) acc[tag] = (acc[tag] ?? 0) + moved;
		}
		demand.set(m.src, acc);
	}
	return demand;
}

/** Allies pay 1 Resource per destination their escorted cubes enter. */
function escortFeeFor(faction: Faction, moves: readonly MarchMove[]): { ally: Faction; fee: number } | null {
	const feeFor = (tag: PieceTag) => unique(moves.filter((m) => n(m.pieces, tag) > 0).map((m) => m.dst)).length;
	if (faction === "PATRIOTS") return { ally: "FRENCH", fee: feeFor(REGULAR_FRE) };
	if (faction === "FRENCH") return { ally: "PATRIOTS", fee: feeFor(REGULAR_PAT) };
	return null;
}

function unique(values: readonly SpaceId[]): SpaceId[] {
	return [...new Set(values)].sort();
}

export function march(board: Board, request: MarchRequest, ctx: ActionContext): ActionResult {
	const { faction, moves } = request;
	if (faction === "FRENCH" && !board.toaPlayed) {
		return reject("not_available", "French cannot March before the Treaty of Alliance");
	}
	if (moves.length === 0) return illegal("March needs at least one move");
	for (const m of moves) {
		const error = validateMove(faction, m, ctx);
		if (error) return illegal(error);
	}
	for (const [src, pieces] of demandBySource(moves)) {
		for (const tag of PIECE_TAGS) {
			if (n(pieces, tag) > count(board, src, tag)) return illegal(`Not enough ${tag} in ${src}`);
		}
	}

	const destinations = unique(moves.map((m) => m.dst));
	const firstFree = faction === "INDIANS" && moves.every((m) => isReserve(m.src));
	const cost = request.free ? 0 : Math.max(0, destinations.length - (firstFree ? 1 : 0));
	if (board.resources[faction] < cost) {
		return reject("insufficient_resources", `${faction} needs ${cost} Resources to March`);
	}
	const escortFee = request.free ? null : escortFeeFor(faction, moves);
	if (escortFee && board.resources[escortFee.ally] < escortFee.fee) {
		return reject("insufficient_resources", `${escortFee.ally} cannot pay ${escortFee.fee} Resources for escorts`);
	}

	const preControl = new Map<SpaceId, ControlValue>(destinations.map((d) => [d, control(board, d)]));

	const mark = beginAction(board);
	spendResources(board, faction, cost);
	if (escortFee) spendResources(board, escortFee.ally, escortFee.fee);

	for (const m of moves) {
		for (const tag of MOVABLE[faction]) {
			const moved = n(m.pieces, tag);
			if (moved === 0) continue;
			const arriveAs = faction === "BRITISH" && tag === WARPARTY_U ? WARPARTY_A : tag;
			move(board, m.src, m.dst, tag, moved, arriveAs);
		}
	}

	activateAfterMarch(board, faction, moves, destinations, preControl);

	return completeAction(board, ctx, { kind: "command", name: "MARCH", faction, spaces: destinations }, mark, {
		cost,
	});
}

function groupSize(m: MarchMove): number {
	let total = 0;
	for (const tag of PIECE_TAGS) total += n(m.pieces, tag);
	return total;
}

function flipUpTo(board: Board, space: SpaceId, from: PieceTag, to: PieceTag, wanted: number): void {
	const k = Math.min(wanted, count(board, space, from));
	if (k > 0) flip(board, space, from, to, k);
}

function activateAfterMarch(
	board: Board,
	faction: Faction,
	moves: readonly MarchMove[],
	destinations: readonly SpaceId[],
	preControl: Map<SpaceId, ControlValue>,
): void {
	if (faction === "BRITISH") {
		for (const dst of destinations) {
			const cubes = count(board, dst, REGULAR_BRI) + count(board, dst, TORY);
			flipUpTo(board, dst, MILITIA_U, MILITIA_A, Math.floor(cubes / 3));
		}
		return;
	}
	if (faction === "PATRIOTS") {
		for (const dst of destinations) {
			flipUpTo(board, dst, WARPARTY_U, WARPARTY_A, Math.floor(count(board, dst, REGULAR_PAT) / 2));
			if (!isCity(dst) || preControl.get(dst) !== "BRITISH") continue;
			const britishCubes = count(board, dst, REGULAR_BRI) + count(board, dst, TORY);
			for (const m of moves) {
				if (m.dst !== dst) continue;
				if (groupSize(m) + britishCubes > 3) flipUpTo(board, dst, MILITIA_U, MILITIA_A, n(m.pieces, MILITIA_U));
			}
		}
		return;
	}
	if (faction === "INDIANS") {
		for (const dst of destinations) {
			if (!isColony(dst) || preControl.get(dst) !== "REBELLION") continue;
			const militia = count(board, dst, MILITIA_U) + count(board, dst, MILITIA_A);
			for (const m of moves) {
				if (m.dst !== dst) continue;
				if (groupSize(m) + militia > 3) flipUpTo(board, dst, WARPARTY_U, WARPARTY_A, n(m.pieces, WARPARTY_U));
			}
		}
	}
}
