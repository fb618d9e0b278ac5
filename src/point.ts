import { Eq } from "fp-ts/lib/Eq";

import { Identifier, Point } from "./types";

export const identifierOf = <I extends Identifier>(point: Point<I>): I =>
  point.id;

export const eqPoint: Eq<Point> = {
  equals: (x, y) => x.id === y.id,
};

/**
 * Two points are the same point when their identifiers are equal, whatever
 * else the caller's type carries.
 */
export const isSame = (other: Point) => (point: Point): boolean =>
  eqPoint.equals(point, other);
