import { describe, expect, test } from "vitest";
import { mulberry32 } from "../src/rng";

describe("mulberry32", () => {
	test("same seed gives the same sequence", () => {
		const a = mulberry32(7);
		const b = mulberry32(7);
		const first = [a(), a(), a()];
		expect([b(), b(), b()]).toEqual(first);
	});

	test("different seeds diverge", () => {
		expect(mulberry32(1)()).not.toBe(mulberry32(2)());
	});

	test("values stay in [0, 1)", () => {
		const rng = mulberry32(123);
		for (let i = 0; i < 1000; i++) {
			const value = rng();
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});
});
