// --- Factions ---------------------------------------------------------------

export const FACTIONS = ["BRITISH", "PATRIOTS", "FRENCH", "INDIANS"] as const;
export type Faction = (typeof FACTIONS)[number];

export type Side = "ROYALIST" | "REBELLION";
export type ControlValue = "BRITISH" | "REBELLION" | null;

export function sideOf(faction: Faction): Side {
	return faction === "BRITISH" || faction === "INDIANS" ? "ROYALIST" : "REBELLION";
}

// --- Pieces -----------------------------------------------------------------

export const PIECE_TAGS = [
	"British_Regular",
	"British_Tory",
	"British_Fort",
	"Patriot_Continental",
	"Patriot_Militia_A",
	"Patriot_Militia_U",
	"Patriot_Fort",
	"French_Regular",
	"Indian_WP_A",
	"Indian_WP_U",
	"Indian_Village",
] as const;
export type PieceTag = (typeof PIECE_TAGS)[number];

export const REGULAR_BRI: "British_Regular" = "British_Regular" satisfies PieceTag;
export const TORY: "British_Tory" = "British_Tory" satisfies PieceTag;
export const FORT_BRI: "British_Fort" = "British_Fort" satisfies PieceTag;
export const REGULAR_PAT: "Patriot_Continental" = "Patriot_Continental" satisfies PieceTag;
export const MILITIA_A: "Patriot_Militia_A" = "Patriot_Militia_A" satisfies PieceTag;
export const MILITIA_U: "Patriot_Militia_U" = "Patriot_Militia_U" satisfies PieceTag;
export const FORT_PAT: "Patriot_Fort" = "Patriot_Fort" satisfies PieceTag;
export const REGULAR_FRE: "French_Regular" = "French_Regular" satisfies PieceTag;
export const WARPARTY_A: "Indian_WP_A" = "Indian_WP_A" satisfies PieceTag;
export const WARPARTY_U: "Indian_WP_U" = "Indian_WP_U" satisfies PieceTag;
export const VILLAGE: "Indian_Village" = "Indian_Village" satisfies PieceTag;

/** Active and Underground variants share one pool and one cap. */
export const POOL_TAG: Record<PieceTag, PieceTag> = {
	British_Regular: REGULAR_BRI,
	British_Tory: TORY,
	British_Fort: FORT_BRI,
	Patriot_Continental: REGULAR_PAT,
	Patriot_Militia_A: MILITIA_U,
	Patriot_Militia_U: MILITIA_U,
	Patriot_Fort: FORT_PAT,
	French_Regular: REGULAR_FRE,
	Indian_WP_A: WARPARTY_U,
	Indian_WP_U: WARPARTY_U,
	Indian_Village: VILLAGE,
};

export const PIECE_CAPS: Partial<Record<PieceTag, number>> = {
	British_Regular: 25,
	British_Tory: 25,
	French_Regular: 15,
	Patriot_Continental: 20,
	Patriot_Militia_U: 15,
	Indian_WP_U: 15,
	British_Fort: 6,
	Patriot_Fort: 6,
	Indian_Village: 12,
};

export const PIECE_OWNER: Record<PieceTag, Faction> = {
	British_Regular: "BRITISH",
	British_Tory: "BRITISH",
	British_Fort: "BRITISH",
	Patriot_Continental: "PATRIOTS",
	Patriot_Militia_A: "PATRIOTS",
	Patriot_Militia_U: "PATRIOTS",
	Patriot_Fort: "PATRIOTS",
	French_Regular: "FRENCH",
	Indian_WP_A: "INDIANS",
	Indian_WP_U: "INDIANS",
	Indian_Village: "INDIANS",
};

export const BASE_TAGS: readonly PieceTag[] = [FORT_BRI, FORT_PAT, VILLAGE];
export const MAX_BASES_PER_SPACE = 2;

export const CUBE_TAGS: readonly PieceTag[] = [REGULAR_BRI, TORY, REGULAR_PAT, REGULAR_FRE];

export const ROYALIST_TAGS: readonly PieceTag[] = [
	REGULAR_BRI,
	TORY,
	FORT_BRI,
	WARPARTY_A,
	WARPARTY_U,
	VILLAGE,
];
export const REBELLION_TAGS: readonly PieceTag[] = [
	REGULAR_PAT,
	MILITIA_A,
	MILITIA_U,
	FORT_PAT,
	REGULAR_FRE,
];

/** Casualties of these tags advance the cumulative British casualty count. */
export const CBC_TAGS: readonly PieceTag[] = [REGULAR_BRI, TORY, FORT_BRI];
/** Casualties of these tags advance the cumulative Rebellion casualty count. */
export const CRC_TAGS: readonly PieceTag[] = [REGULAR_PAT, REGULAR_FRE, FORT_PAT];

export function isCube(tag: PieceTag): boolean {
	return CUBE_TAGS.includes(tag);
}

export function lossValue(tag: PieceTag): number {
	return tag === REGULAR_BRI ||
		tag === REGULAR_PAT ||
		tag === REGULAR_FRE ||
		tag === FORT_BRI ||
		tag === FORT_PAT
		? 2
		: 1;
}

// --- Support ----------------------------------------------------------------

export const ACTIVE_SUPPORT = 2;
export const PASSIVE_SUPPORT = 1;
export const NEUTRAL = 0;
export const PASSIVE_OPPOSITION = -1;
export const ACTIVE_OPPOSITION = -2;
export type SupportLevel = -2 | -1 | 0 | 1 | 2;

// --- Resources, markers, naval ------------------------------------------------

export const MAX_RESOURCES = 50;

export const MARKERS = ["Propaganda", "Raid", "Blockade"] as const;
export type MarkerId = (typeof MARKERS)[number];
export const PROPAGANDA: "Propaganda" = "Propaganda" satisfies MarkerId;
export const RAID: "Raid" = "Raid" satisfies MarkerId;
export const BLOCKADE: "Blockade" = "Blockade" satisfies MarkerId;

export const MARKER_CAPS: Record<MarkerId, number> = {
	Propaganda: 12,
	Raid: 12,
	Blockade: 3,
};

export const MAX_FNI = 3;
export const WEST_INDIES = "West_Indies";

// --- Leaders ----------------------------------------------------------------

export const LEADERS = [
	"GAGE",
	"HOWE",
	"CLINTON",
	"WASHINGTON",
	"ROCHAMBEAU",
	"LAUZUN",
	"BRANT",
	"CORNPLANTER",
	"DRAGGING_CANOE",
] as const;
export type LeaderId = (typeof LEADERS)[number];

export const LEADER_FACTION: Record<LeaderId, Faction> = {
	GAGE: "BRITISH",
	HOWE: "BRITISH",
	CLINTON: "BRITISH",
	WASHINGTON: "PATRIOTS",
	ROCHAMBEAU: "FRENCH",
	LAUZUN: "FRENCH",
	BRANT: "INDIANS",
	CORNPLANTER: "INDIANS",
	DRAGGING_CANOE: "INDIANS",
};

/** Who takes over at a Leader Change. Patriots never change. */
export const LEADER_SUCCESSOR: Partial<Record<LeaderId, LeaderId>> = {
	GAGE: "HOWE",
	HOWE: "CLINTON",
	ROCHAMBEAU: "LAUZUN",
	BRANT: "CORNPLANTER",
	CORNPLANTER: "DRAGGING_CANOE",
};

// --- Cards ------------------------------------------------------------------

export const WINTER_QUARTERS_CARDS: readonly number[] = [97, 98, 99, 100, 101, 102, 103, 104];
export const BRILLIANT_STROKE_CARDS: readonly number[] = [105, 106, 107, 108, 109];

/** Resources gained when a faction passes. */
export const PASS_REWARD: Record<Faction, number> = {
	BRITISH: 2,
	PATRIOTS: 1,
	FRENCH: 2,
	INDIANS: 1,
};
