export * from "./botController";
export * from "./backtest/backtestRunner";
export * from "./backtest/backtestTypes";
export * from "./live/liveLoop";
export * from "./loop/runTick";
export * from "./session/tradingSession";
export type { RuntimeMode } from "./runtimeShared";
