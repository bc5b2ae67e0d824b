import type { PriceSource } from "../types";

export interface SyntheticPriceSourceOptions {
	/** Uniform [0, 1) generator. Defaults to Math.random. */
	random?: () => number;
	minBasePrice?: number;
	maxBasePrice?: number;
	/** Standard deviation of each sample as a fraction of the base price. */
	volatility?: number;
}

/**
 * Offline stand-in for an exchange: every symbol gets a base price drawn
 * once, and each sample is that base plus Gaussian noise.
 */
export class SyntheticPriceSource implements PriceSource {
	readonly venue = "synthetic";
	private readonly random: () => number;
	private readonly minBasePrice: number;
	private readonly maxBasePrice: number;
	private readonly volatility: number;
	private readonly basePrices = new Map<string, number>();

	constructor(options: SyntheticPriceSourceOptions = {}) {
		this.random = options.random ?? Math.random;
		this.minBasePrice = options.minBasePrice ?? 10_000;
		this.maxBasePrice = options.maxBasePrice ?? 40_000;
		this.volatility = options.volatility ?? 0.01;
	}

	async currentPrice(symbol: string): Promise<number> {
		return this.sample(this.basePrice(symbol));
	}

	async recentPrices(
		symbol: string,
		_interval: string,
		limit: number
	): Promise<number[]> {
		const base = this.basePrice(symbol);
		return Array.from({ length: Math.max(0, limit) }, () => this.sample(base));
	}

	private basePrice(symbol: string): number {
		const existing = this.basePrices.get(symbol);
		if (existing !== undefined) {
			return existing;
		}
		const base =
			this.minBasePrice +
			this.random() * (this.maxBasePrice - this.minBasePrice);
		this.basePrices.set(symbol, base);
		return base;
	}

	private sample(base: number): number {
		const price = base + this.gaussian() * base * this.volatility;
		return price > 0 ? price : base;
	}

	// Box-Muller transform.
	private gaussian(): number {
		const u1 = 1 - this.random();
		const u2 = this.random();
		return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
	}
}
