import { describe, expect, it } from "vitest";
import { ConfigurationError, Position } from "@crossbot/core";
import { RiskManager, RiskManagerConfig } from "./riskManager";

const baseRiskConfig: RiskManagerConfig = {
	baseAssetAmount: 1,
	stopLossPct: 0.02,
	takeProfitPct: 0.03,
	maxPositionSize: 10,
};

const createManager = (
	overrides: Partial<RiskManagerConfig> = {}
): RiskManager => new RiskManager({ ...baseRiskConfig, ...overrides });

const openAt100: Position = {
	entryPrice: 100,
	quantity: 1,
	entryTimestamp: 0,
};

describe("RiskManager.apply", () => {
	it("opens a fixed-size position on BUY when flat", () => {
		const decision = createManager({ baseAssetAmount: 0.5 }).apply({
			position: null,
			signal: "BUY",
			price: 200,
			timestamp: 7,
		});
		expect(decision.position).toEqual({
			entryPrice: 200,
			quantity: 0.5,
			entryTimestamp: 7,
		});
		expect(decision.trades).toEqual([
			{ timestamp: 7, action: "BUY", price: 200, quantity: 0.5 },
		]);
		expect(decision.realizedPnl).toBe(0);
		expect(decision.exitReason).toBeNull();
	});

	it("ignores BUY while a position is open", () => {
		const decision = createManager().apply({
			position: openAt100,
			signal: "BUY",
			price: 101,
			timestamp: 1,
		});
		expect(decision.position).toBe(openAt100);
		expect(decision.trades).toEqual([]);
	});

	it("closes on SELL and realizes pnl", () => {
		const decision = createManager().apply({
			position: openAt100,
			signal: "SELL",
			price: 101,
			timestamp: 3,
		});
		expect(decision.position).toBeNull();
		expect(decision.realizedPnl).toBe(1);
		expect(decision.exitReason).toBe("signal");
		expect(decision.trades).toEqual([
			{
				timestamp: 3,
				action: "SELL",
				price: 101,
				quantity: 1,
				reason: "signal",
				realizedPnl: 1,
			},
		]);
	});

	it("ignores SELL when flat", () => {
		const decision = createManager().apply({
			position: null,
			signal: "SELL",
			price: 100,
			timestamp: 0,
		});
		expect(decision).toEqual({
			position: null,
			trades: [],
			realizedPnl: 0,
			exitReason: null,
		});
	});

	it("stops out at or below the stop-loss threshold", () => {
		const decision = createManager().apply({
			position: openAt100,
			signal: "HOLD",
			price: 97.9,
			timestamp: 1,
		});
		expect(decision.position).toBeNull();
		expect(decision.exitReason).toBe("stop_loss");
		expect(decision.trades).toHaveLength(1);
		expect(decision.trades[0].action).toBe("SELL");
		expect(decision.trades[0].price).toBe(97.9);
		expect(decision.realizedPnl).toBeCloseTo(-2.1, 10);
	});

	it("takes profit at or above the take-profit threshold", () => {
		const decision = createManager().apply({
			position: openAt100,
			signal: "HOLD",
			price: 103.5,
			timestamp: 1,
		});
		expect(decision.position).toBeNull();
		expect(decision.exitReason).toBe("take_profit");
		expect(decision.trades[0].price).toBe(103.5);
		expect(decision.realizedPnl).toBeCloseTo(3.5, 10);
	});

	it("lets a SELL signal close before the stop-loss is considered", () => {
		const decision = createManager().apply({
			position: openAt100,
			signal: "SELL",
			price: 90,
			timestamp: 2,
		});
		expect(decision.trades).toHaveLength(1);
		expect(decision.exitReason).toBe("signal");
		expect(decision.trades[0].reason).toBe("signal");
	});

	it("keeps the position between the thresholds", () => {
		const decision = createManager().apply({
			position: openAt100,
			signal: "HOLD",
			price: 101,
			timestamp: 1,
		});
		expect(decision.position).toBe(openAt100);
		expect(decision.trades).toEqual([]);
	});

	it("hands out frozen trades", () => {
		const decision = createManager().apply({
			position: null,
			signal: "BUY",
			price: 100,
			timestamp: 0,
		});
		expect(Object.isFrozen(decision.trades[0])).toBe(true);
	});
});

describe("RiskManager construction", () => {
	it.each<[Partial<RiskManagerConfig>, RegExp]>([
		[{ baseAssetAmount: 0 }, /baseAssetAmount must be positive/],
		[{ stopLossPct: 0 }, /stopLossPct must be between 0 and 1/],
		[{ takeProfitPct: 1 }, /takeProfitPct must be between 0 and 1/],
		[{ baseAssetAmount: 20 }, /exceeds maxPositionSize 10/],
	])("rejects %j", (overrides, message) => {
		expect(() => createManager(overrides)).toThrowError(ConfigurationError);
		expect(() => createManager(overrides)).toThrowError(message);
	});

	it("exposes the threshold prices", () => {
		const manager = createManager();
		expect(manager.stopLossPrice(100)).toBeCloseTo(98, 10);
		expect(manager.takeProfitPrice(100)).toBeCloseTo(103, 10);
	});
});
