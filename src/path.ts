import * as E from "fp-ts/lib/Either";
import { Eq, contramap } from "fp-ts/lib/Eq";
import { pipe } from "fp-ts/lib/function";
import * as NEA from "fp-ts/lib/NonEmptyArray";
import * as O from "fp-ts/lib/Option";
import * as Ord from "fp-ts/lib/Ord";
import * as RA from "fp-ts/lib/ReadonlyArray";
import * as S from "fp-ts/lib/string";

import { EmptyPath, emptyPath } from "./errors";
import { eqPoint, identifierOf, isSame } from "./point";
import { Path, PathBuilder, Point } from "./types";

export const DEFAULT_SEPARATOR = "-";

export const pathBuilder = <P extends Point = Point>(): PathBuilder<P> => ({
  points: [],
});

export const addPoint = <P extends Point>(point: P) => (builder: PathBuilder<P>): PathBuilder<P> =>
  ({
    points: [...builder.points, point],
  });

export const addPoints = <P extends Point>(points: ReadonlyArray<P>) => (builder: PathBuilder<P>): PathBuilder<P> =>
  ({
    points: [...builder.points, ...points],
  });

// A path has to start somewhere.
export const buildPath =
  <P extends Point>() =>
    (builder: PathBuilder<P>): E.Either<EmptyPath, Path<P>> =>
      pipe(
        NEA.fromArray([...builder.points]),
        E.fromOption(emptyPath),
        E.map(points => ({ points })),
      );

/**
 * Returns a new path with `point` appended. The given path is left as it
 * was, so every search branch can extend its own copy.
 */
export const push = <P extends Point>(point: P) => (path: Path<P>): Path<P> =>
  ({
    points: [...path.points, point],
  });

export const containsPoint = (point: Point) => <P extends Point>(path: Path<P>): boolean =>
  RA.elem(eqPoint)(point, path.points);

export const notContainsPoint = (point: Point) => <P extends Point>(path: Path<P>): boolean =>
  !containsPoint(point)(path);

export const endsWith = (point: Point) => <P extends Point>(path: Path<P>): boolean =>
  pipe(
    path.points,
    RA.last,
    O.exists(isSame(point)),
  );

export const startsWith = (point: Point) => <P extends Point>(path: Path<P>): boolean =>
  pipe(
    path.points,
    RA.head,
    O.exists(isSame(point)),
  );

export const pathLength = <P extends Point>(path: Path<P>): number =>
  path.points.length;

export const toArray = <P extends Point>(path: Path<P>): P[] =>
  [...path.points];

export const render = (separator: string = DEFAULT_SEPARATOR) => <P extends Point>(path: Path<P>): string =>
  path.points
    .map(point => String(identifierOf(point)))
    .join(separator);

export const eqPath: Eq<Path<Point>> = pipe(
  RA.getEq(eqPoint),
  contramap((path: Path<Point>) => path.points),
);

// Search results come back in traversal order; sort with this when a
// stable order is needed.
export const ordByRendering: Ord.Ord<Path<Point>> = pipe(
  S.Ord,
  Ord.contramap((path: Path<Point>) => render()(path)),
);
