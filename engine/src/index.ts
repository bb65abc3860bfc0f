export * from "./atomic";
export * from "./collateral-vault";
export * from "./config";
export * from "./constants";
export * from "./debt-ledger";
export * from "./engine";
export * from "./errors";
export * from "./events";
export * from "./health-factor";
export * from "./liquidation-engine";
export * from "./logger";
export * from "./metrics";
export * from "./mint-burn-gateway";
export * from "./price-feed";
export * from "./price-oracle-adapter";
export * from "./tokens";
export * from "./utils";
