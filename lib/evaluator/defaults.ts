import { Strategy } from "./strategy.ts";

export const DEFAULT_STRATEGY = Strategy.NormalOrder;

/** Step budget used when a caller gives none. */
export const DEFAULT_MAX_STEPS = 100;

/**
 * Number of consecutive identical snapshots after which a run is stopped as
 * stagnant.
 */
export const STAGNATION_WINDOW = 3;
