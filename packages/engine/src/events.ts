import { z } from "zod";
import cardEventsData from "../data/card_events.json";
import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "./actions";
import {
	bases,
	type Board,
	count,
	flip,
	gainResources,
	loseResources,
	moveLeader,
	place,
	placeMarker,
	type Pool,
	poolCount,
	pushHistory,
	releaseBlockade,
	remove,
	removeCasualties,
	setFni,
	shiftSupport,
	transfer,
} from "./board";
import { canGatherIn } from "./commands/gather";
import {
	BASE_TAGS,
	FACTIONS,
	type Faction,
	MARKER_CAPS,
	MAX_BASES_PER_SPACE,
	MAX_FNI,
	MILITIA_A,
	MILITIA_U,
	PIECE_TAGS,
	type PieceTag,
	POOL_TAG,
	REGULAR_BRI,
	REGULAR_FRE,
	VILLAGE,
	WARPARTY_U,
	WEST_INDIES,
} from "./constants";
import { control } from "./control";
import { isCity, isColony, isProvince, isReserve, MAP, population, type SpaceId, SPACE_IDS } from "./map";

// --- Card data --------------------------------------------------------------

const FactionSchema = z.enum(FACTIONS);
const PoolSchema = z.enum(["available", "casualties", "unavailable"]);
const PieceTagSchema = z.enum(PIECE_TAGS);
const TagListSchema = z.array(PieceTagSchema).min(1);
const SpaceIdSchema = z.string().refine((id) => Object.hasOwn(MAP, id), { message: "unknown space" });
const ControlSchema = z.enum(["BRITISH", "REBELLION"]);

/**
 * A fixed space, or the first `pick` spaces (in `among` order, else map order)
 * that match every filter given. `with` and `also` each need one of their tags.
 */
const TargetSchema = z.union([
	SpaceIdSchema,
	z.object({
		among: z.array(SpaceIdSchema).optional(),
		type: z.enum(["City", "Colony", "Reserve", "Province"]).optional(),
		with: TagListSchema.optional(),
		also: TagListSchema.optional(),
		control: ControlSchema.optional(),
		pick: z.union([z.number().int().positive(), z.literal("all")]).default(1),
	}),
]);

export type EventTarget = z.infer<typeof TargetSchema>;

export const EventStepSchema = z.discriminatedUnion("op", [
	/** Up to `n` pieces in each target, drawn from `tags` in order and from `from` pools in order. */
	z.object({
		op: z.literal("place"),
		tags: TagListSchema,
		n: z.number().int().positive(),
		in: TargetSchema,
		from: z.array(PoolSchema).min(1).default(["available"]),
	}),
	/** Up to `n` pieces in total across the targets (the whole map when `in` is absent); all when `n` is absent. */
	z.object({
		op: z.literal("remove"),
		tags: TagListSchema,
		n: z.number().int().positive().optional(),
		in: TargetSchema.optional(),
		to: z.enum(["available", "casualties"]).default("available"),
	}),
	/** Removes up to `n` pieces in total and places `per` of `to` for each one. */
	z.object({
		op: z.literal("replace"),
		from: TagListSchema,
		to: PieceTagSchema,
		per: z.number().int().positive().default(1),
		n: z.number().int().positive().optional(),
		in: TargetSchema,
	}),
	z.object({ op: z.literal("shift"), levels: z.number().int(), in: TargetSchema }),
	/** Moves support up to `steps` levels toward `level`. */
	z.object({
		op: z.literal("toward"),
		level: z.number().int().min(-2).max(2),
		steps: z.number().int().positive().default(1),
		in: TargetSchema,
	}),
	z.object({ op: z.literal("marker"), marker: z.enum(["Propaganda", "Raid"]), in: TargetSchema }),
	/** Flips up to `n` Underground Militia in total; all when `n` is absent. */
	z.object({ op: z.literal("activate"), n: z.number().int().positive().optional(), in: TargetSchema.optional() }),
	/** Free Gather placement: Villages + 1 War Parties, or 1 where no Village stands. */
	z.object({ op: z.literal("gather"), in: TargetSchema }),
	z.object({ op: z.literal("cityPopulation"), faction: FactionSchema, control: ControlSchema }),
	z.object({ op: z.literal("blockades"), n: z.number().int().positive() }),
]);

export type EventStep = z.infer<typeof EventStepSchema>;

export const EventEffectSchema = z.object({
	resources: z.record(FactionSchema, z.number().int()).optional(),
	/** FNI steps; ignored before the Treaty of Alliance. */
	fni: z.number().int().optional(),
	fniSet: z.number().int().min(0).max(MAX_FNI).optional(),
	eligibility: z.record(FactionSchema, z.enum(["ineligible", "ineligibleThroughNext", "remainEligible"])).optional(),
	frenchRegulars: z
		.object({ from: PoolSchema, to: PoolSchema, n: z.number().int().positive() })
		.optional(),
	/** Board steps, run before the resource and track effects. */
	steps: z.array(EventStepSchema).optional(),
	/** Steps that depend on who plays the card; they run after `steps`. */
	byFaction: z.record(FactionSchema, z.array(EventStepSchema)).optional(),
});

export type EventEffect = z.infer<typeof EventEffectSchema>;

export const CardEventsSchema = z.record(
	z.string().regex(/^\d+$/),
	z.object({ unshaded: EventEffectSchema.optional(), shaded: EventEffectSchema.optional() }),
);

const CARD_EVENTS = CardEventsSchema.parse(cardEventsData);

export function eventEffect(cardId: number, shaded: boolean): EventEffect | null {
	const entry = CARD_EVENTS[String(cardId)];
	return (shaded ? entry?.shaded : entry?.unshaded) ?? null;
}

// --- Targets ----------------------------------------------------------------

const TYPE_TESTS = { City: isCity, Colony: isColony, Reserve: isReserve, Province: isProvince } as const;

/** Resolves a target against the board as it stands; `accept` filters before picking. */
export function resolveTarget(
	board: Board,
	target: EventTarget,
	accept: (space: SpaceId) => boolean = () => true,
): SpaceId[] {
	if (typeof target === "string") return accept(target) ? [target] : [];
	const holds = (space: SpaceId, tags: readonly PieceTag[] | undefined) =>
		tags === undefined || tags.some((tag) => count(board, space, tag) > 0);
	const matches = (target.among ?? SPACE_IDS).filter(
		(space) =>
			(target.type === undefined || TYPE_TESTS[target.type](space)) &&
			holds(space, target.with) &&
			holds(space, target.also) &&
			(target.control === undefined || control(board, space) === target.control) &&
			accept(space),
	);
	return target.pick === "all" ? matches : matches.slice(0, target.pick);
}

function roomFor(board: Board, space: SpaceId, tag: PieceTag): number {
	return BASE_TAGS.includes(tag) ? MAX_BASES_PER_SPACE - bases(board, space) : Number.POSITIVE_INFINITY;
}

/** Places up to `n` of `tags` (first tag first) from `pools`; returns how many landed. */
function placeUpTo(
	board: Board,
	space: SpaceId,
	tags: readonly PieceTag[],
	n: number,
	pools: readonly Pool[] = ["available"],
): number {
	let placed = 0;
	for (const tag of tags) {
		for (const pool of pools) {
			const k = Math.min(n - placed, poolCount(board, pool, POOL_TAG[tag]), roomFor(board, space, tag));
			if (k <= 0) continue;
			place(board, space, tag, k, pool);
			placed += k;
		}
	}
	return placed;
}

function removeUpTo(
	board: Board,
	space: SpaceId,
	tags: readonly PieceTag[],
	n: number,
	to: "available" | "casualties",
): number {
	let removed = 0;
	for (const tag of tags) {
		const k = Math.min(n - removed, count(board, space, tag));
		if (k <= 0) continue;
		if (to === "casualties") removeCasualties(board, space, tag, k);
		else remove(board, space, tag, k);
		removed += k;
	}
	return removed;
}

// --- Steps ------------------------------------------------------------------

/** Runs one step and returns the spaces it changed. */
function runStep(board: Board, step: EventStep): SpaceId[] {
	const touched: SpaceId[] = [];
	switch (step.op) {
		case "place":
			for (const space of resolveTarget(board, step.in, (s) => step.tags.some((t) => roomFor(board, s, t) > 0))) {
				if (placeUpTo(board, space, step.tags, step.n, step.from) > 0) touched.push(space);
			}
			return touched;
		case "remove": {
			const spaces = step.in === undefined ? SPACE_IDS : resolveTarget(board, step.in);
			let left = step.n ?? Number.POSITIVE_INFINITY;
			for (const space of spaces) {
				if (left <= 0) break;
				const removed = removeUpTo(board, space, step.tags, left, step.to);
				if (removed > 0) touched.push(space);
				left -= removed;
			}
			return touched;
		}
		case "replace": {
			let left = step.n ?? Number.POSITIVE_INFINITY;
			for (const space of resolveTarget(board, step.in)) {
				if (left <= 0) break;
				const removed = removeUpTo(board, space, step.from, left, "available");
				if (removed === 0) continue;
				placeUpTo(board, space, [step.to], removed * step.per);
				touched.push(space);
				left -= removed;
			}
			return touched;
		}
		case "shift":
			for (const space of resolveTarget(board, step.in)) {
				if (shiftSupport(board, space, step.levels) > 0) touched.push(space);
			}
			return touched;
		case "toward":
			for (const space of resolveTarget(board, step.in)) {
				const gap = step.level - (board.support[space] ?? 0);
				const levels = Math.sign(gap) * Math.min(Math.abs(gap), step.steps);
				if (levels !== 0 && shiftSupport(board, space, levels) > 0) touched.push(space);
			}
			return touched;
		case "marker": {
			const markers = board.markers[step.marker];
			for (const space of resolveTarget(board, step.in, (s) => !markers.onMap.has(s))) {
				if (markers.pool < 1) break;
				placeMarker(board, step.marker, space);
				touched.push(space);
			}
			return touched;
		}
		case "activate": {
			const spaces = step.in === undefined ? SPACE_IDS : resolveTarget(board, step.in);
			let left = step.n ?? Number.POSITIVE_INFINITY;
			for (const space of spaces) {
				const k = Math.min(left, count(board, space, MILITIA_U));
				if (k <= 0) continue;
				flip(board, space, MILITIA_U, MILITIA_A, k);
				touched.push(space);
				left -= k;
			}
			return touched;
		}
		case "gather":
			for (const space of resolveTarget(board, step.in, (s) => canGatherIn(board, s))) {
				const villages = count(board, space, VILLAGE);
				if (placeUpTo(board, space, [WARPARTY_U], villages > 0 ? villages + 1 : 1) > 0) touched.push(space);
			}
			return touched;
		case "cityPopulation": {
			const cities = SPACE_IDS.filter((s) => isCity(s) && control(board, s) === step.control);
			gainResources(board, step.faction, cities.reduce((sum, s) => sum + population(s), 0));
			return touched;
		}
		case "blockades": {
			const blockades = board.markers.Blockade;
			for (let i = 0; i < step.n; i++) {
				if (board.unavailableBlockades < 1) break;
				if (blockades.pool + blockades.onMap.size >= MARKER_CAPS.Blockade) break;
				releaseBlockade(board);
				if (!touched.includes(WEST_INDIES)) touched.push(WEST_INDIES);
			}
			return touched;
		}
	}
}

// --- Event hook -------------------------------------------------------------

export type EventRequest = {
	faction: Faction;
	cardId: number;
	shaded: boolean;
};

/**
 * Plays one side of a card. Sides without data are recorded as played with
 * no board effect.
 */
export function playEvent(board: Board, request: EventRequest, ctx: ActionContext): ActionResult {
	const { faction, cardId, shaded } = request;
	if (!Number.isInteger(cardId) || cardId < 1) return illegal(`Unknown card ${cardId}`);
	const effect = eventEffect(cardId, shaded);

	const mark = beginAction(board);
	pushHistory(board, { type: "note", message: `Event ${cardId} ${shaded ? "shaded" : "unshaded"}`, faction, cardId });
	const spaces = effect ? applyEffect(board, effect, faction, ctx) : [];

	return completeAction(board, ctx, { kind: "event", name: "EVENT", faction, spaces }, mark, {
		cardId,
		shaded,
		scripted: effect !== null,
	});
}

function applyEffect(board: Board, effect: EventEffect, faction: Faction, ctx: ActionContext): SpaceId[] {
	const touched = new Set<SpaceId>();
	for (const step of [...(effect.steps ?? []), ...(effect.byFaction?.[faction] ?? [])]) {
		for (const space of runStep(board, step)) touched.add(space);
	}
	for (const f of FACTIONS) {
		const delta = effect.resources?.[f] ?? 0;
		if (delta > 0) gainResources(board, f, delta);
		if (delta < 0) loseResources(board, f, -delta);
	}
	if (board.toaPlayed) {
		if (effect.fniSet !== undefined) setFni(board, effect.fniSet);
		if (effect.fni !== undefined) setFni(board, Math.max(0, Math.min(MAX_FNI, board.fni + effect.fni)));
	}
	const regulars = effect.frenchRegulars;
	if (regulars) {
		transfer(board, REGULAR_FRE, regulars.from, regulars.to, Math.min(regulars.n, poolCount(board, regulars.from, REGULAR_FRE)));
	}
	for (const f of FACTIONS) {
		const status = effect.eligibility?.[f];
		if (status) ctx.eligibility[f] = status;
	}
	return [...touched];
}

// --- Treaty of Alliance -----------------------------------------------------

export const TREATY_OF_ALLIANCE_CARD = 109;
export const TREATY_THRESHOLD = 15;
export const TREATY_REINFORCEMENTS = 3;

/** French Regulars Available + Blockades out of play + cumulative British casualties. */
export function preparations(board: Board): number {
	return poolCount(board, "available", REGULAR_FRE) + board.unavailableBlockades + board.cbc;
}

export function treatyOfAlliance(board: Board, ctx: ActionContext): ActionResult {
	if (board.toaPlayed) return reject("not_available", "The Treaty of Alliance is already in force");
	if (preparations(board) <= TREATY_THRESHOLD) {
		return illegal(`French preparations ${preparations(board)} do not exceed ${TREATY_THRESHOLD}`);
	}

	const mark = beginAction(board);
	board.toaPlayed = true;
	pushHistory(board, { type: "note", message: "Treaty of Alliance", faction: "FRENCH", cardId: TREATY_OF_ALLIANCE_CARD });
	setFni(board, Math.min(MAX_FNI, board.fni + 1));
	for (const tag of [REGULAR_FRE, REGULAR_BRI]) {
		const fromUnavailable = Math.min(TREATY_REINFORCEMENTS, poolCount(board, "unavailable", tag));
		place(board, WEST_INDIES, tag, fromUnavailable, "unavailable");
		const rest = Math.min(TREATY_REINFORCEMENTS - fromUnavailable, poolCount(board, "available", tag));
		place(board, WEST_INDIES, tag, rest);
	}
	moveLeader(board, "ROCHAMBEAU", WEST_INDIES);

	return completeAction(
		board,
		ctx,
		{ kind: "event", name: "TREATY_OF_ALLIANCE", faction: "FRENCH", spaces: [WEST_INDIES] },
		mark,
		{ cardId: TREATY_OF_ALLIANCE_CARD },
	);
}
