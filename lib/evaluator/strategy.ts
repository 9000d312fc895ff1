/**
 * Reduction strategies.
 *
 * | strategy    | search order                         | under λ | argument        |
 * |-------------|--------------------------------------|---------|-----------------|
 * | normal      | node, then function, then argument   | yes     | reduced         |
 * | applicative | function, then argument, then node   | yes     | reduced first   |
 * | name        | node, then function                  | no      | never reduced   |
 * | value       | function, then argument, then node   | no      | reduced first   |
 *
 * The last two stop at a weak normal form: redexes inside an abstraction, and
 * for call-by-name in argument position, are left alone.
 *
 * @module
 */
export enum Strategy {
  NormalOrder = "normal-order",
  ApplicativeOrder = "applicative-order",
  CallByName = "call-by-name",
  CallByValue = "call-by-value",
}

export const ALL_STRATEGIES: readonly Strategy[] = [
  Strategy.NormalOrder,
  Strategy.ApplicativeOrder,
  Strategy.CallByName,
  Strategy.CallByValue,
];

const ALIASES: ReadonlyMap<string, Strategy> = new Map([
  ["normal", Strategy.NormalOrder],
  ["normal-order", Strategy.NormalOrder],
  ["no", Strategy.NormalOrder],
  ["applicative", Strategy.ApplicativeOrder],
  ["applicative-order", Strategy.ApplicativeOrder],
  ["ao", Strategy.ApplicativeOrder],
  ["name", Strategy.CallByName],
  ["call-by-name", Strategy.CallByName],
  ["cbn", Strategy.CallByName],
  ["value", Strategy.CallByValue],
  ["call-by-value", Strategy.CallByValue],
  ["cbv", Strategy.CallByValue],
]);

/**
 * Looks up a strategy by any of its accepted spellings, case-insensitively.
 * Returns null for an unknown name.
 */
export function parseStrategy(name: string): Strategy | null {
  return ALIASES.get(name.trim().toLowerCase().replace(/_/g, "-")) ?? null;
}

/** Whether the strategy looks for redexes inside abstraction bodies. */
export const reducesUnderLambda = (strategy: Strategy): boolean =>
  strategy === Strategy.NormalOrder || strategy === Strategy.ApplicativeOrder;
