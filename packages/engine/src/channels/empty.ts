/** Held by a channel that has no value; distinct from a held `undefined` or `null`. */
export const EMPTY: unique symbol = Symbol('waypoint.empty');

export type Empty = typeof EMPTY;
