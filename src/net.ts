import * as A from "fp-ts/lib/Array";
import * as E from "fp-ts/lib/Either";
import { pipe } from "fp-ts/lib/function";
import * as NEA from "fp-ts/lib/NonEmptyArray";
import * as O from "fp-ts/lib/Option";
import * as RA from "fp-ts/lib/ReadonlyArray";
import * as RNEA from "fp-ts/lib/ReadonlyNonEmptyArray";

import { defaultConfig, NetConfig } from "./config";
import {
  DuplicatePoint,
  duplicatePoints,
  NetError,
  NetInconsistencyError,
  NoPathFound,
  noPathFound,
  pathCannotBeBuilt,
  PointNotFound,
  pointNotFound,
} from "./errors";
import { Logger } from "./logger";
import { connectedPointsNotInPath, isConnectedTo, pointIs } from "./node";
import { eqPoint, identifierOf } from "./point";
import { addPoint, buildPath, endsWith, pathBuilder, push, render } from "./path";
import { Identifier, Net, Node, Path, Point } from "./types";

/**
 * Assembles a net from a copy of `nodes`. Nothing is validated: if two nodes share an
 * identifier, lookups resolve to the first one.
 */
export const net = <P extends Point>(nodes: ReadonlyArray<Node<P>>): Net<P> => ({
  nodes: [...nodes],
});

// Each repeated identifier is listed once, however many extra nodes it has.
const duplicateIds = <P extends Point>(nodes: ReadonlyArray<Node<P>>): ReadonlyArray<Identifier> =>
  pipe(
    nodes.filter((node, index) => nodes.findIndex(other => pointIs(node.point)(other)) !== index),
    RA.map(node => node.point),
    RA.uniq(eqPoint),
    RA.map(point => identifierOf(point)),
  );

/**
 * Assembles a net, failing when more than one node is given for the same
 * point. Every duplicate is reported in the one error.
 */
export const fromNodes = <P extends Point>(nodes: ReadonlyArray<Node<P>>): E.Either<DuplicatePoint, Net<P>> =>
  pipe(
    duplicateIds(nodes),
    RNEA.fromReadonlyArray,
    O.fold(
      (): E.Either<DuplicatePoint, Net<P>> => E.right(net(nodes)),
      ids => E.left(duplicatePoints(ids)),
    ),
  );

export const findNode = (point: Point) => <P extends Point>(n: Net<P>): O.Option<Node<P>> =>
  pipe(
    n.nodes,
    RA.findFirst((node: Node<P>) => pointIs(point)(node)),
  );

export const hasPoint = (point: Point) => <P extends Point>(n: Net<P>): boolean =>
  pipe(n, findNode(point), O.isSome);

export const size = <P extends Point>(n: Net<P>): number =>
  n.nodes.length;

/**
 * True when every point of the path has a node in the net and each step of
 * the path follows a connection.
 */
export const isPathInNet = (path: Path<Point>) => <P extends Point>(n: Net<P>): boolean =>
  pipe(
    path.points,
    RA.every(point => hasPoint(point)(n)),
  ) && pipe(
    RA.zip(path.points, pipe(path.points, RA.dropLeft(1))),
    RA.every(([from, to]) => pipe(n, findNode(from), O.exists(node => isConnectedTo(to)(node)))),
  );

const findNodeOrFail = (point: Point) => <P extends Point>(n: Net<P>): E.Either<PointNotFound, Node<P>> =>
  pipe(
    n,
    findNode(point),
    E.fromOption(() => pointNotFound(point.id)),
  );

// A connection to a point without a node means the net itself is broken;
// that is not something a search result can express.
const getNodeOrThrow = <P extends Point>(n: Net<P>, logger: Logger, reachedFrom: Node<P>) => (point: P): Node<P> =>
  pipe(
    n,
    findNode(point),
    O.getOrElse((): Node<P> => {
      const err = new NetInconsistencyError(point.id, reachedFrom.point.id);
      logger.error("search", err.message);
      throw err;
    }),
  );

type Branch<P extends Point> = E.Either<NoPathFound, NEA.NonEmptyArray<Path<P>>>;

const search =
  <P extends Point>(n: Net<P>, destination: P, logger: Logger) =>
    (node: Node<P>, path: Path<P>): Branch<P> => {
      if (endsWith(destination)(path)) {
        return E.right(NEA.of(path));
      }

      return pipe(
        node,
        connectedPointsNotInPath(path),
        O.fold(
          (): Branch<P> => {
            logger.debug("search", () => `dead end at ${render()(path)}`);
            return E.left(noPathFound());
          },
          candidates => pipe(
            candidates,
            A.chain(candidate => pipe(
              search(n, destination, logger)(
                getNodeOrThrow(n, logger, node)(candidate),
                push(candidate)(path),
              ),
              // A branch that finds nothing only drops out of the aggregate.
              E.fold(
                (): Path<P>[] => [],
                paths => paths,
              ),
            )),
            NEA.fromArray,
            E.fromOption(noPathFound),
          ),
        ),
      );
    };

/**
 * Every simple path from `from` to `to`, in the order the search meets them
 * (each node's connections are followed in insertion order). Results are not
 * sorted.
 *
 * Throws `NetInconsistencyError` when a connection names a point that has no
 * node in the net.
 */
export const findPaths =
  <P extends Point>(from: P, to: P, config: NetConfig = defaultConfig()) =>
    (n: Net<P>): E.Either<NetError, NEA.NonEmptyArray<Path<P>>> => {
      const { logger } = config;
      logger.debug("find", `searching paths from '${from.id}' to '${to.id}'`);

      const result = pipe(
        n,
        findNodeOrFail(from),
        E.chain(fromNode => pipe(
          n,
          findNodeOrFail(to),
          E.map(() => fromNode),
        )),
        E.chainW(fromNode => pipe(
          pathBuilder<P>(),
          addPoint(from),
          buildPath<P>(),
          E.mapLeft(pathCannotBeBuilt),
          E.map(path => ({ fromNode, path })),
        )),
        E.chainW(({ fromNode, path }) => search(n, to, logger)(fromNode, path)),
      );

      pipe(
        result,
        E.fold(
          err => err._tag === "PointNotFound"
            ? logger.warn("find", err.message)
            : logger.info("find", err.message),
          paths => logger.info("find", `found ${paths.length} path(s) from '${from.id}' to '${to.id}'`),
        ),
      );

      return result;
    };
