/**
 * Shared helpers for the DSC engine modules
 */

import { ethers } from "ethers";
import { EngineError } from "./errors";

/** Seconds since the epoch, as used by feed `updatedAt` stamps */
export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

/**
 * Normalise an EVM address to its checksummed form.
 * Throws InvalidAddress if the value cannot be parsed.
 */
export function toAddress(value: string, label: string): string {
  if (!ethers.isAddress(value)) {
    throw new EngineError("InvalidAddress", `${label} is not a valid address: ${String(value).slice(0, 64)}`);
  }
  return ethers.getAddress(value);
}

/** 18-decimal amount rendered for log lines */
export function fmt(amount: bigint): string {
  return ethers.formatEther(amount);
}

export function isZeroAddress(address: string): boolean {
  return address === ethers.ZeroAddress;
}
