import { z } from "zod";
import type { Board, HistoryEntry, PieceCounts } from "./board";
import {
	FACTIONS,
	LEADERS,
	type LeaderId,
	MARKERS,
	type MarkerId,
	PIECE_TAGS,
	type SupportLevel,
} from "./constants";
import { SPACE_IDS } from "./map";

// --- Boundary format ----------------------------------------------------------

const CountSchema = z.number().int().nonnegative();

export const PieceCountsSchema = z.record(z.enum(PIECE_TAGS), CountSchema);

export const SupportLevelSchema = z.union([
	z.literal(-2),
	z.literal(-1),
	z.literal(0),
	z.literal(1),
	z.literal(2),
]);

export const MarkerSnapshotSchema = z.object({
	pool: CountSchema,
	on_map: z.array(z.string()).default([]),
});

export const BoardSnapshotSchema = z.object({
	spaces: z.record(z.string(), PieceCountsSchema),
	resources: z.record(z.enum(FACTIONS), z.number().int().min(0).max(50)),
	available: PieceCountsSchema.default({}),
	casualties: PieceCountsSchema.default({}),
	unavailable: PieceCountsSchema.default({}),
	support: z.record(z.string(), SupportLevelSchema).default({}),
	leaders: z.record(z.enum(LEADERS), z.string().nullable()).default({}),
	markers: z.record(z.enum(MARKERS), MarkerSnapshotSchema).default({}),
	unavailableBlockades: CountSchema.default(0),
	fni: z.number().int().min(0).max(3).default(0),
	toaPlayed: z.boolean().default(false),
	cbc: CountSchema.default(0),
	crc: CountSchema.default(0),
	deck: z.array(z.number().int().positive()).default([]),
});

export type BoardSnapshotInput = z.input<typeof BoardSnapshotSchema>;
export type BoardSnapshot = z.output<typeof BoardSnapshotSchema>;

const DEFAULT_MARKER_POOL: Record<MarkerId, number> = {
	Propaganda: 12,
	Raid: 12,
	Blockade: 0,
};

function copyCounts(counts: PieceCounts | undefined): PieceCounts {
	return { ...(counts ?? {}) };
}

/**
 * Builds the board aggregate from a canonical snapshot. The snapshot is trusted;
 * parse untrusted input through BoardSnapshotSchema first.
 */
export function createBoard(snapshot: BoardSnapshot): Board {
	const spaces: Board["spaces"] = {};
	for (const id of SPACE_IDS) spaces[id] = copyCounts(snapshot.spaces[id]);

	const leader = (id: LeaderId) => snapshot.leaders[id] ?? null;
	const marker = (id: MarkerId) => {
		const entry = snapshot.markers[id];
		return {
			pool: entry?.pool ?? DEFAULT_MARKER_POOL[id],
			onMap: new Set(entry?.on_map ?? []),
		};
	};

	return {
		spaces,
		available: copyCounts(snapshot.available),
		casualties: copyCounts(snapshot.casualties),
		unavailable: copyCounts(snapshot.unavailable),
		resources: {
			BRITISH: snapshot.resources.BRITISH ?? 0,
			PATRIOTS: snapshot.resources.PATRIOTS ?? 0,
			FRENCH: snapshot.resources.FRENCH ?? 0,
			INDIANS: snapshot.resources.INDIANS ?? 0,
		},
		support: Object.fromEntries(
			SPACE_IDS.map((id): [string, SupportLevel] => [id, snapshot.support[id] ?? 0]),
		),
		leaders: {
			GAGE: leader("GAGE"),
			HOWE: leader("HOWE"),
			CLINTON: leader("CLINTON"),
			WASHINGTON: leader("WASHINGTON"),
			ROCHAMBEAU: leader("ROCHAMBEAU"),
			LAUZUN: leader("LAUZUN"),
			BRANT: leader("BRANT"),
			CORNPLANTER: leader("CORNPLANTER"),
			DRAGGING_CANOE: leader("DRAGGING_CANOE"),
		},
		markers: {
			Propaganda: marker("Propaganda"),
			Raid: marker("Raid"),
			Blockade: marker("Blockade"),
		},
		unavailableBlockades: snapshot.unavailableBlockades,
		fni: snapshot.fni,
		toaPlayed: snapshot.toaPlayed,
		cbc: snapshot.cbc,
		crc: snapshot.crc,
		deck: [...snapshot.deck],
		history: [],
	};
}

/** Convenience for tests and scenario files: parse, apply defaults, build. */
export function boardFromSnapshot(input: BoardSnapshotInput): Board {
	return createBoard(BoardSnapshotSchema.parse(input));
}

export type BoardSnapshotOutput = Omit<BoardSnapshot, "markers"> & {
	markers: Record<MarkerId, { pool: number; on_map: string[] }>;
	history: HistoryEntry[];
};

export function toSnapshot(board: Board): BoardSnapshotOutput {
	const marker = (id: MarkerId) => ({
		pool: board.markers[id].pool,
		on_map: [...board.markers[id].onMap].sort(),
	});
	const spaces: Record<string, PieceCounts> = {};
	for (const [id, counts] of Object.entries(board.spaces)) {
		if (Object.keys(counts).length > 0) spaces[id] = { ...counts };
	}
	return {
		spaces,
		resources: { ...board.resources },
		available: { ...board.available },
		casualties: { ...board.casualties },
		unavailable: { ...board.unavailable },
		support: { ...board.support },
		leaders: { ...board.leaders },
		markers: {
			Propaganda: marker("Propaganda"),
			Raid: marker("Raid"),
			Blockade: marker("Blockade"),
		},
		unavailableBlockades: board.unavailableBlockades,
		fni: board.fni,
		toaPlayed: board.toaPlayed,
		cbc: board.cbc,
		crc: board.crc,
		deck: [...board.deck],
		history: [...board.history],
	};
}
