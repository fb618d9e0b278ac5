import { Option } from "fp-ts/lib/Option";

export type Identifier = string | number;

export interface Point<I extends Identifier = Identifier> {
  readonly id: I;
}

export type Connection<P extends Point> = {
  readonly to: P;
}

export type Node<P extends Point> = {
  readonly point: P;
  readonly connections: ReadonlyArray<Connection<P>>;
}

export type Path<P extends Point> = {
  readonly points: ReadonlyArray<P>;
}

export type Net<P extends Point> = {
  readonly nodes: ReadonlyArray<Node<P>>;
}

export interface NodeBuilder<P extends Point> {
  point: Option<P>;
  connections: Connection<P>[];
}

export interface PathBuilder<P extends Point> {
  points: P[];
}
