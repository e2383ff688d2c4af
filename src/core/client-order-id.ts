import { createHash, randomBytes } from "crypto";
import type { OrderSide } from "../models/order";

export interface ClientOrderIdOptions {
  brokerId: string;
  maxOrderIdLength: number;
  now?: () => number;
  /** Random suffix source, hex encoded */
  nonce?: () => string;
}

/**
 * Compact pair tag: "ETH-USDC" → "ETHUSDC"
 */
function pairTag(tradingPair: string): string {
  return tradingPair.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}

/**
 * Human-readable seed: side letter, broker, pair, time and a random suffix,
 * truncated to the exchange's label limit.
 */
export function buildOrderIdSeed(
  side: OrderSide,
  tradingPair: string,
  options: ClientOrderIdOptions,
): string {
  const now = options.now ?? Date.now;
  const nonce = options.nonce ?? (() => randomBytes(4).toString("hex"));
  const seed = `${side === "BUY" ? "B" : "S"}${options.brokerId}-${pairTag(tradingPair)}-${now()}${nonce()}`;
  return seed.slice(0, options.maxOrderIdLength);
}

/**
 * Client order id sent as the order label: "0x" + md5 hex of the seed
 * (34 characters).
 */
export function createClientOrderId(
  side: OrderSide,
  tradingPair: string,
  options: ClientOrderIdOptions,
): string {
  const seed = buildOrderIdSeed(side, tradingPair, options);
  return `0x${createHash("md5").update(seed, "utf8").digest("hex")}`;
}
