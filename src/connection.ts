import { Eq, contramap } from "fp-ts/lib/Eq";
import { pipe } from "fp-ts/lib/function";

import { eqPoint, isSame } from "./point";
import { Connection, Point } from "./types";

export const connection = <P extends Point>(to: P): Connection<P> =>
  ({ to });

export const target = <P extends Point>(conn: Connection<P>): P =>
  conn.to;

export const targets = (point: Point) => (conn: Connection<Point>): boolean =>
  pipe(target(conn), isSame(point));

// Connections compare by target identity only.
export const eqConnection: Eq<Connection<Point>> = pipe(
  eqPoint,
  contramap((conn: Connection<Point>) => target(conn)),
);
