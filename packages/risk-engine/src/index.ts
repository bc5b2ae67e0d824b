export { RiskManager } from "./riskManager";
export type { RiskDecision, RiskInput, RiskManagerConfig } from "./riskManager";
