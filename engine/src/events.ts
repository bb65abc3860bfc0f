/** Events emitted by the engine once a step commits. */

export interface CollateralDeposited {
  type: "CollateralDeposited";
  user: string;
  asset: string;
  amount: bigint;
}

export interface CollateralRedeemed {
  type: "CollateralRedeemed";
  redeemedFrom: string;
  redeemedTo: string;
  asset: string;
  amount: bigint;
}

export interface Liquidated {
  type: "Liquidated";
  liquidator: string;
  user: string;
  asset: string;
  debtCovered: bigint;
  collateralSeized: bigint;
}

export type EngineEvent = CollateralDeposited | CollateralRedeemed | Liquidated;

export type EventSink = (event: EngineEvent) => void;
