import { MONEY_DECIMALS } from "@splitledger/shared";

const FACTOR = 10 ** MONEY_DECIMALS;

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * FACTOR) / FACTOR;
}
