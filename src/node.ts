import * as A from "fp-ts/lib/Array";
import * as E from "fp-ts/lib/Either";
import * as Eq from "fp-ts/lib/Eq";
import { pipe } from "fp-ts/lib/function";
import * as NEA from "fp-ts/lib/NonEmptyArray";
import * as O from "fp-ts/lib/Option";
import * as RA from "fp-ts/lib/ReadonlyArray";

import { connection, eqConnection, target, targets } from "./connection";
import { missingPoint, NodeError, selfConnection } from "./errors";
import { notContainsPoint } from "./path";
import { eqPoint, isSame } from "./point";
import { Node, NodeBuilder, Path, Point } from "./types";

export const nodeBuilder = <P extends Point = Point>(): NodeBuilder<P> => ({
  point: O.none,
  connections: [],
});

export const setPoint = <P extends Point>(point: P) => (builder: NodeBuilder<P>): NodeBuilder<P> =>
  ({
    point: O.some(point),
    connections: builder.connections,
  });

// Connections form a set keyed by target identity: a second connection to
// the same point is dropped.
export const addConnection = <P extends Point>(point: P) => (builder: NodeBuilder<P>): NodeBuilder<P> =>
  A.elem(eqConnection)(connection(point), builder.connections)
    ? builder
    : {
      point: builder.point,
      connections: [...builder.connections, connection(point)],
    };

export const addConnections = <P extends Point>(points: ReadonlyArray<P>) => (builder: NodeBuilder<P>): NodeBuilder<P> =>
  points.reduce((acc, point) => addConnection(point)(acc), builder);

export const buildNode =
  <P extends Point>() =>
    (builder: NodeBuilder<P>): E.Either<NodeError, Node<P>> =>
      pipe(
        builder.point,
        E.fromOption<NodeError>(missingPoint),
        E.chain((point): E.Either<NodeError, Node<P>> =>
          pipe(builder.connections, A.some(targets(point)))
            ? E.left(selfConnection(point.id))
            : E.right({
              point,
              connections: [...builder.connections],
            })
        ),
      );

export const pointIs = (point: Point) => <P extends Point>(node: Node<P>): boolean =>
  isSame(point)(node.point);

export const isConnectedTo = (point: Point) => <P extends Point>(node: Node<P>): boolean =>
  pipe(node.connections, RA.some(targets(point)));

export const connectedPoints = <P extends Point>(node: Node<P>): P[] =>
  node.connections.map(conn => target(conn));

/**
 * The next hops available from `node` for a route that has already walked
 * `path`, in connection order. `none` when every neighbour is on the path.
 */
export const connectedPointsNotInPath =
  (path: Path<Point>) =>
    <P extends Point>(node: Node<P>): O.Option<NEA.NonEmptyArray<P>> =>
      pipe(
        connectedPoints(node),
        A.filter(point => notContainsPoint(point)(path)),
        NEA.fromArray,
      );

export const eqNode: Eq.Eq<Node<Point>> = Eq.struct({
  point: eqPoint,
  connections: RA.getEq(eqConnection),
});
