import { describe, expect, test } from "vitest";
import {
	activeRebels,
	battle,
	battleableSpaces,
	canBattle,
	count,
	MILITIA_A,
	poolCount,
	REGULAR_BRI,
	REGULAR_PAT,
	rebelDefense,
	royalistForce,
} from "@liberty/engine";
import { expectOk, makeBoard, makeContext } from "./helpers";

describe("battle scoring helpers", () => {
	test("Royalist force counts Tories up to the Regulars and half the Active War Parties", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 3, British_Tory: 5, Indian_WP_A: 2 } },
		});
		expect(royalistForce(board, "Massachusetts")).toBe(7);
	});

	test("Rebel defense counts half the Underground Militia and Forts", () => {
		const board = makeBoard({
			spaces: { Virginia: { Patriot_Continental: 2, Patriot_Militia_A: 1, Patriot_Militia_U: 3, Patriot_Fort: 1 } },
		});
		expect(rebelDefense(board, "Virginia")).toBe(5);
		expect(activeRebels(board, "Virginia")).toBe(3);
	});

	test("each British leader in the space adds one", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 2, British_Tory: 1 } },
			leaders: { GAGE: "Massachusetts", CLINTON: "Massachusetts", WASHINGTON: "Massachusetts" },
		});
		expect(royalistForce(board, "Massachusetts")).toBe(5);
	});

	test("an even force does not open a Battle", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 3, Patriot_Militia_A: 2, Patriot_Continental: 1 } },
		});
		expect(battleableSpaces(board)).toEqual([]);
		expect(canBattle(board)).toBe(false);
	});

	test("a British leader tips the balance", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 3, Patriot_Militia_A: 2, Patriot_Continental: 1 } },
			leaders: { HOWE: "Massachusetts" },
		});
		expect(battleableSpaces(board)).toEqual(["Massachusetts"]);
	});

	test("Washington counts toward the rebels", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 4, Patriot_Militia_A: 2, Patriot_Continental: 1 } },
			leaders: { WASHINGTON: "Massachusetts" },
		});
		expect(battleableSpaces(board)).toEqual([]);
	});

	test("fewer than two Active Rebels never qualify", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 6, Patriot_Militia_A: 1, Patriot_Militia_U: 4 } },
		});
		expect(battleableSpaces(board)).toEqual([]);
	});
});

describe("battle command", () => {
	test("an even exchange leaves the defender in place", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 3, Patriot_Militia_A: 2, Patriot_Continental: 1 } },
			resources: { BRITISH: 5, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(battle(board, { faction: "BRITISH", spaces: ["Massachusetts"] }, makeContext([0])));

		expect(board.resources.BRITISH).toBe(4);
		expect(count(board, "Massachusetts", REGULAR_BRI)).toBe(2);
		expect(count(board, "Massachusetts", REGULAR_PAT)).toBe(0);
		expect(count(board, "Massachusetts", MILITIA_A)).toBe(2);
		expect(board.cbc).toBe(1);
		expect(board.crc).toBe(1);
		expect(outcome.notes).toEqual({
			"Massachusetts.winner": "REBELLION",
			"Massachusetts.attackerLosses": 1,
			"Massachusetts.defenderLosses": 1,
		});
	});

	test("a Royalist rout shifts the space toward Active Support", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 6, Patriot_Militia_A: 3, Patriot_Continental: 1 } },
			resources: { BRITISH: 1, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const outcome = expectOk(battle(board, { faction: "BRITISH", spaces: ["Massachusetts"] }, makeContext([0.9])));

		expect(outcome.notes["Massachusetts.winner"]).toBe("ROYALIST");
		expect(outcome.notes["Massachusetts.defenderLosses"]).toBe(4);
		expect(count(board, "Massachusetts", REGULAR_BRI)).toBe(5);
		expect(poolCount(board, "casualties", REGULAR_PAT)).toBe(1);
		expect(poolCount(board, "available", "Patriot_Militia_U")).toBe(3);
		expect(board.support.Massachusetts).toBe(2);
	});

	test("rejections leave the board untouched", () => {
		const board = makeBoard({
			spaces: { Massachusetts: { British_Regular: 3, Patriot_Militia_A: 2 }, Virginia: { French_Regular: 2, Indian_WP_A: 1 } },
			resources: { BRITISH: 0, PATRIOTS: 0, FRENCH: 5, INDIANS: 0 },
		});
		const ctx = makeContext();
		expect(battle(board, { faction: "INDIANS", spaces: ["Massachusetts"] }, ctx)).toMatchObject({
			ok: false,
			reason: "illegal_action",
		});
		expect(battle(board, { faction: "FRENCH", spaces: ["Virginia"] }, ctx)).toMatchObject({
			ok: false,
			reason: "not_available",
		});
		expect(battle(board, { faction: "BRITISH", spaces: ["Massachusetts"] }, ctx)).toMatchObject({
			ok: false,
			reason: "insufficient_resources",
		});
		expect(battle(board, { faction: "BRITISH", spaces: ["Virginia"] }, ctx)).toMatchObject({
			ok: false,
			error: "BRITISH has no attacking pieces in Virginia",
		});
		expect(board.history).toEqual([]);
		expect(ctx.outcomes).toEqual([]);
	});

	test("Common Cause War Parties fight as Tories", () => {
		const board = makeBoard({
			spaces: { New_York: { British_Regular: 2, Indian_WP_A: 2, Patriot_Militia_A: 2 } },
			resources: { BRITISH: 1, PATRIOTS: 0, FRENCH: 0, INDIANS: 0 },
		});
		const ctx = makeContext([0]);
		ctx.commonCause.New_York = 2;
		const outcome = expectOk(battle(board, { faction: "BRITISH", spaces: ["New_York"] }, ctx));

		expect(outcome.notes["New_York.defenderLosses"]).toBe(2);
		expect(count(board, "New_York", MILITIA_A)).toBe(0);
		expect(outcome.notes["New_York.winner"]).toBe("ROYALIST");
	});
});
