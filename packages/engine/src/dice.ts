/** Uniform source in [0, 1). The session owns the only instance. */
export type Rng = () => number;

export function rollDie(rng: Rng, sides: number): number {
	return Math.min(sides, 1 + Math.floor(rng() * sides));
}

export function rollD6(rng: Rng): number {
	return rollDie(rng, 6);
}

export function rollD3(rng: Rng): number {
	return rollDie(rng, 3);
}

/** Sum of `n` D3s. */
export function rollD3s(rng: Rng, n: number): number {
	let total = 0;
	for (let i = 0; i < n; i++) total += rollD3(rng);
	return total;
}
