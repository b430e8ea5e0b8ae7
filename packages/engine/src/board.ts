import {
	BASE_TAGS,
	CBC_TAGS,
	CRC_TAGS,
	type Faction,
	isCube,
	type LeaderId,
	type MarkerId,
	MARKER_CAPS,
	MAX_BASES_PER_SPACE,
	MAX_FNI,
	MAX_RESOURCES,
	PIECE_CAPS,
	PIECE_TAGS,
	POOL_TAG,
	type PieceTag,
	type SupportLevel,
	WEST_INDIES,
} from "./constants";
import { InvariantViolation } from "./errors";
import type { SpaceId } from "./map";

// --- Types ------------------------------------------------------------------

export type PieceCounts = Partial<Record<PieceTag, number>>;
export type Pool = "available" | "casualties" | "unavailable";

export type MarkerState = {
	/** Markers not on the map. For Blockades this is the West Indies box. */
	pool: number;
	onMap: Set<SpaceId>;
};

export type HistoryEntry =
	| {
			type: "piece";
			op: "place" | "remove" | "move" | "flip" | "transfer" | "set";
			tag: PieceTag;
			count: number;
			from: string;
			to: string;
			as?: PieceTag;
	  }
	| { type: "resources"; faction: Faction; delta: number; after: number }
	| { type: "support"; space: SpaceId; from: SupportLevel; to: SupportLevel }
	| { type: "marker"; marker: MarkerId; op: "place" | "remove" | "release"; space: SpaceId }
	| { type: "fni"; from: number; to: number }
	| { type: "leader"; leader: LeaderId; from: SpaceId | null; to: SpaceId | null }
	| { type: "note"; message: string; faction?: Faction; cardId?: number };

export type Board = {
	spaces: Record<SpaceId, PieceCounts>;
	available: PieceCounts;
	casualties: PieceCounts;
	unavailable: PieceCounts;
	resources: Record<Faction, number>;
	support: Record<SpaceId, SupportLevel>;
	leaders: Record<LeaderId, SpaceId | null>;
	markers: Record<MarkerId, MarkerState>;
	/** Blockade markers out of play until Préparer la Guerre brings them in. */
	unavailableBlockades: number;
	fni: number;
	toaPlayed: boolean;
	cbc: number;
	crc: number;
	deck: number[];
	history: HistoryEntry[];
};

// --- Reads ------------------------------------------------------------------

export function count(board: Board, space: SpaceId, tag: PieceTag): number {
	return board.spaces[space]?.[tag] ?? 0;
}

export function countAll(board: Board, space: SpaceId, tags: readonly PieceTag[]): number {
	let total = 0;
	for (const tag of tags) total += count(board, space, tag);
	return total;
}

export function poolCount(board: Board, pool: Pool, tag: PieceTag): number {
	return board[pool][tag] ?? 0;
}

export function bases(board: Board, space: SpaceId): number {
	return countAll(board, space, BASE_TAGS);
}

/** Sum per pool family across every location. */
export function pieceTotals(board: Board): Partial<Record<PieceTag, number>> {
	const totals: Partial<Record<PieceTag, number>> = {};
	const add = (counts: PieceCounts) => {
		for (const tag of PIECE_TAGS) {
			const n = counts[tag] ?? 0;
			if (n === 0) continue;
			const family = POOL_TAG[tag];
			totals[family] = (totals[family] ?? 0) + n;
		}
	};
	for (const counts of Object.values(board.spaces)) add(counts);
	add(board.available);
	add(board.casualties);
	add(board.unavailable);
	return totals;
}

export function leaderAt(board: Board, leader: LeaderId): SpaceId | null {
	return board.leaders[leader];
}

export function leadersIn(board: Board, space: SpaceId): LeaderId[] {
	const found: LeaderId[] = [];
	for (const [leader, at] of Object.entries(board.leaders)) {
		if (at !== space) continue;
		if (isLeaderId(board, leader)) found.push(leader);
	}
	return found.sort();
}

function isLeaderId(board: Board, value: string): value is LeaderId {
	return Object.hasOwn(board.leaders, value);
}

export function hasMarker(board: Board, marker: MarkerId, space: SpaceId): boolean {
	return board.markers[marker].onMap.has(space);
}

export function isBlockaded(board: Board, space: SpaceId): boolean {
	return hasMarker(board, "Blockade", space);
}

export function cloneBoard(board: Board): Board {
	return structuredClone(board);
}

// --- Guarded writes ---------------------------------------------------------

function spaceCounts(board: Board, space: SpaceId): PieceCounts {
	const counts = board.spaces[space];
	if (!counts) throw new InvariantViolation("lookup", space, "unknown space");
	return counts;
}

function adjust(
	counts: PieceCounts,
	tag: PieceTag,
	delta: number,
	operation: string,
	location: string,
): void {
	const next = (counts[tag] ?? 0) + delta;
	if (next < 0) {
		throw new InvariantViolation(
			operation,
			location,
			`${tag} would become ${next}`,
		);
	}
	if (next === 0) delete counts[tag];
	else counts[tag] = next;
}

function assertCount(n: number, operation: string, location: string): void {
	if (!Number.isInteger(n) || n < 0) {
		throw new InvariantViolation(operation, location, `invalid count ${n}`);
	}
}

function assertStacking(
	board: Board,
	space: SpaceId,
	tag: PieceTag,
	n: number,
	operation: string,
): void {
	if (!BASE_TAGS.includes(tag)) return;
	if (bases(board, space) + n > MAX_BASES_PER_SPACE) {
		throw new InvariantViolation(
			operation,
			space,
			`more than ${MAX_BASES_PER_SPACE} Forts and Villages`,
		);
	}
}

function assertCap(board: Board, tag: PieceTag, delta: number, operation: string, location: string) {
	const family = POOL_TAG[tag];
	const cap = PIECE_CAPS[family];
	if (cap === undefined) return;
	const total = (pieceTotals(board)[family] ?? 0) + delta;
	if (total > cap) {
		throw new InvariantViolation(operation, location, `${family} total ${total} exceeds cap ${cap}`);
	}
}

export function pushHistory(board: Board, entry: HistoryEntry): void {
	board.history.push(entry);
}

export function setCount(board: Board, space: SpaceId, tag: PieceTag, n: number): void {
	assertCount(n, "setCount", space);
	const current = count(board, space, tag);
	const delta = n - current;
	if (delta === 0) return;
	if (delta > 0) {
		assertCap(board, tag, delta, "setCount", space);
		assertStacking(board, space, tag, delta, "setCount");
	}
	adjust(spaceCounts(board, space), tag, delta, "setCount", space);
	pushHistory(board, { type: "piece", op: "set", tag, count: n, from: space, to: space });
}

/** Pool to space. Militia and War Parties are drawn from their Underground pool. */
export function place(
	board: Board,
	space: SpaceId,
	tag: PieceTag,
	n: number,
	from: Pool = "available",
): void {
	assertCount(n, "place", space);
	if (n === 0) return;
	const counts = spaceCounts(board, space);
	if (poolCount(board, from, POOL_TAG[tag]) < n) {
		throw new InvariantViolation("place", from, `only ${poolCount(board, from, POOL_TAG[tag])} ${POOL_TAG[tag]} for ${n} into ${space}`);
	}
	assertStacking(board, space, tag, n, "place");
	adjust(board[from], POOL_TAG[tag], -n, "place", from);
	adjust(counts, tag, n, "place", space);
	pushHistory(board, { type: "piece", op: "place", tag, count: n, from, to: space });
}

/** Space to pool. Militia and War Parties return Underground. */
export function remove(
	board: Board,
	space: SpaceId,
	tag: PieceTag,
	n: number,
	to: Pool = "available",
): void {
	assertCount(n, "remove", space);
	if (n === 0) return;
	const counts = spaceCounts(board, space);
	adjust(counts, tag, -n, "remove", space);
	adjust(board[to], POOL_TAG[tag], n, "remove", to);
	pushHistory(board, { type: "piece", op: "remove", tag, count: n, from: space, to });
}

/**
 * Removes pieces lost in combat. Cubes go to Casualties, everything else to
 * Available; British, Continental and French cubes and Forts advance CBC/CRC.
 */
export function removeCasualties(board: Board, space: SpaceId, tag: PieceTag, n: number): void {
	if (n === 0) return;
	remove(board, space, tag, n, isCube(tag) ? "casualties" : "available");
	if (CBC_TAGS.includes(tag)) board.cbc += n;
	if (CRC_TAGS.includes(tag)) board.crc += n;
}

export function move(
	board: Board,
	from: SpaceId,
	to: SpaceId,
	tag: PieceTag,
	n: number,
	arriveAs: PieceTag = tag,
): void {
	assertCount(n, "move", from);
	if (n === 0) return;
	if (POOL_TAG[arriveAs] !== POOL_TAG[tag]) {
		throw new InvariantViolation("move", from, `${tag} cannot arrive as ${arriveAs}`);
	}
	const source = spaceCounts(board, from);
	const dest = spaceCounts(board, to);
	if ((source[tag] ?? 0) < n) {
		throw new InvariantViolation("move", from, `only ${source[tag] ?? 0} ${tag} for ${n}`);
	}
	assertStacking(board, to, arriveAs, n, "move");
	adjust(source, tag, -n, "move", from);
	adjust(dest, arriveAs, n, "move", to);
	pushHistory(board, {
		type: "piece",
		op: "move",
		tag,
		count: n,
		from,
		to,
		...(arriveAs !== tag ? { as: arriveAs } : {}),
	});
}

/** Posture change in place (Active <-> Underground). */
export function flip(board: Board, space: SpaceId, from: PieceTag, to: PieceTag, n: number): void {
	assertCount(n, "flip", space);
	if (n === 0) return;
	if (POOL_TAG[from] !== POOL_TAG[to] || from === to) {
		throw new InvariantViolation("flip", space, `${from} cannot flip to ${to}`);
	}
	const counts = spaceCounts(board, space);
	adjust(counts, from, -n, "flip", space);
	adjust(counts, to, n, "flip", space);
	pushHistory(board, { type: "piece", op: "flip", tag: from, as: to, count: n, from: space, to: space });
}

export function transfer(board: Board, tag: PieceTag, from: Pool, to: Pool, n: number): void {
	assertCount(n, "transfer", from);
	if (n === 0) return;
	const family = POOL_TAG[tag];
	adjust(board[from], family, -n, "transfer", from);
	adjust(board[to], family, n, "transfer", to);
	pushHistory(board, { type: "piece", op: "transfer", tag: family, count: n, from, to });
}

// --- Resources, support, markers, leaders ------------------------------------

/** Adds up to `n` Resources; anything past the cap is lost. Returns the gain. */
export function gainResources(board: Board, faction: Faction, n: number): number {
	assertCount(n, "gainResources", faction);
	const gain = Math.min(n, MAX_RESOURCES - board.resources[faction]);
	if (gain > 0) {
		board.resources[faction] += gain;
		pushHistory(board, { type: "resources", faction, delta: gain, after: board.resources[faction] });
	}
	return gain;
}

export function spendResources(board: Board, faction: Faction, n: number): void {
	assertCount(n, "spendResources", faction);
	if (n === 0) return;
	if (board.resources[faction] < n) {
		throw new InvariantViolation(
			"spendResources",
			faction,
			`cost ${n} exceeds ${board.resources[faction]}`,
		);
	}
	board.resources[faction] -= n;
	pushHistory(board, { type: "resources", faction, delta: -n, after: board.resources[faction] });
}

/** Event losses take what is there; returns the amount actually lost. */
export function loseResources(board: Board, faction: Faction, n: number): number {
	const loss = Math.min(n, board.resources[faction]);
	spendResources(board, faction, loss);
	return loss;
}

export function canAfford(board: Board, faction: Faction, n: number): boolean {
	return board.resources[faction] >= n;
}

function toSupportLevel(n: number): SupportLevel {
	switch (n) {
		case -2:
		case -1:
		case 0:
		case 1:
		case 2:
			return n;
		default:
			throw new InvariantViolation("shiftSupport", String(n), "support out of range");
	}
}

/**
 * Shifts support by up to |steps| levels (positive toward Active Support) and
 * stops at the end of the track. Returns the number of levels moved.
 */
export function shiftSupport(board: Board, space: SpaceId, steps: number): number {
	const from = board.support[space] ?? 0;
	const target = Math.max(-2, Math.min(2, from + steps));
	if (target === from) return 0;
	const to = toSupportLevel(target);
	board.support[space] = to;
	pushHistory(board, { type: "support", space, from, to });
	return Math.abs(to - from);
}

export function placeMarker(board: Board, marker: MarkerId, space: SpaceId): void {
	const state = board.markers[marker];
	if (state.pool < 1) throw new InvariantViolation("placeMarker", space, `no ${marker} markers left`);
	if (state.onMap.has(space)) throw new InvariantViolation("placeMarker", space, `${marker} already present`);
	state.pool -= 1;
	state.onMap.add(space);
	pushHistory(board, { type: "marker", marker, op: "place", space });
}

export function removeMarker(board: Board, marker: MarkerId, space: SpaceId): void {
	const state = board.markers[marker];
	if (!state.onMap.has(space)) throw new InvariantViolation("removeMarker", space, `no ${marker} marker`);
	state.onMap.delete(space);
	state.pool += 1;
	pushHistory(board, { type: "marker", marker, op: "remove", space });
}

/** Brings one out-of-play Blockade into the West Indies box. */
export function releaseBlockade(board: Board): void {
	const state = board.markers.Blockade;
	if (board.unavailableBlockades < 1) {
		throw new InvariantViolation("releaseBlockade", WEST_INDIES, "no Blockades out of play");
	}
	if (state.pool + state.onMap.size + 1 > MARKER_CAPS.Blockade) {
		throw new InvariantViolation("releaseBlockade", WEST_INDIES, `more than ${MARKER_CAPS.Blockade} Blockades in play`);
	}
	board.unavailableBlockades -= 1;
	state.pool += 1;
	pushHistory(board, { type: "marker", marker: "Blockade", op: "release", space: WEST_INDIES });
}

export function setFni(board: Board, value: number): void {
	if (!Number.isInteger(value) || value < 0 || value > MAX_FNI) {
		throw new InvariantViolation("setFni", "FNI", `value ${value} outside 0..${MAX_FNI}`);
	}
	if (value === board.fni) return;
	pushHistory(board, { type: "fni", from: board.fni, to: value });
	board.fni = value;
}

export function moveLeader(board: Board, leader: LeaderId, to: SpaceId | null): void {
	const from = board.leaders[leader];
	if (from === to) return;
	if (to !== null) spaceCounts(board, to);
	board.leaders[leader] = to;
	pushHistory(board, { type: "leader", leader, from, to });
}
