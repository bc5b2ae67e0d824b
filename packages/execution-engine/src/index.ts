export { TradeLedger } from "./tradeLedger";
export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot } from "./paperAccount";
