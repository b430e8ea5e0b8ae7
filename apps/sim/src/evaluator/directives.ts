import {
	type Board,
	control,
	count,
	FACTIONS,
	type Faction,
	FORT_BRI,
	MILITIA_A,
	MILITIA_U,
	poolCount,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	SPACE_IDS,
	TORY,
} from "@liberty/engine";
import { z } from "zod";
import instructionsData from "../../data/event_instructions.json";

// --- Instruction sheet ------------------------------------------------------

export type Directive =
	| { kind: "force" }
	| { kind: "ignore" }
	/** Skip the Event when fewer than `threshold` Militia would flip (half the Underground ones). */
	| { kind: "ignoreIfMilitia"; threshold: number }
	| { kind: "forceIf"; cardId: number };

const DirectiveSchema = z.string().transform((raw, ctx): Directive => {
	if (raw === "force") return { kind: "force" };
	if (raw === "ignore") return { kind: "ignore" };
	const militia = /^ignore_if_(\d+)_militia$/.exec(raw);
	if (militia?.[1]) return { kind: "ignoreIfMilitia", threshold: Number(militia[1]) };
	const forced = /^force_if_(\d+)$/.exec(raw);
	if (forced?.[1]) return { kind: "forceIf", cardId: Number(forced[1]) };
	ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown directive ${raw}` });
	return z.NEVER;
});

export const EventInstructionsSchema = z.record(
	z.enum(FACTIONS),
	z.record(z.string().regex(/^\d+$/), DirectiveSchema),
);

const INSTRUCTIONS = EventInstructionsSchema.parse(instructionsData);

export function directiveFor(faction: Faction, cardId: number): Directive | null {
	return INSTRUCTIONS[faction]?.[String(cardId)] ?? null;
}

// --- Conditional overrides --------------------------------------------------

const onMap = (test: (space: string) => boolean) => SPACE_IDS.some(test);

const rebelUnits = (board: Board, space: string) =>
	count(board, space, REGULAR_PAT) +
	count(board, space, REGULAR_FRE) +
	count(board, space, MILITIA_A) +
	count(board, space, MILITIA_U);

/** `force_if_<card>` predicates; false sends the faction to its Command instead. */
export const FORCE_IF: Readonly<Record<number, (board: Board) => boolean>> = {
	// A Battle space for the French exists.
	52: (board) =>
		onMap(
			(s) =>
				count(board, s, REGULAR_FRE) > 0 &&
				count(board, s, REGULAR_BRI) + count(board, s, TORY) + count(board, s, FORT_BRI) > 0,
		),
	// Militia can be placed.
	62: (board) => poolCount(board, "available", MILITIA_U) > 0,
	// British Regulars share a space with Rebels.
	70: (board) => onMap((s) => count(board, s, REGULAR_BRI) > 0 && rebelUnits(board, s) > 0),
	73: (board) => onMap((s) => count(board, s, FORT_BRI) > 0),
	// Rebellion can still gain Quebec City.
	83: (board) => control(board, "Quebec_City") !== "REBELLION",
	95: (board) => onMap((s) => count(board, s, FORT_BRI) > 0),
};

export function hiddenMilitiaToFlip(board: Board): number {
	let hidden = 0;
	for (const space of SPACE_IDS) hidden += count(board, space, MILITIA_U);
	return Math.floor(hidden / 2);
}
