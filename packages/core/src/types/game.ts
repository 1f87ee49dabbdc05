export interface GameConfig {
  gameId: string;
  version: string;
  settings?: Record<string, unknown>;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

/** Side identifier as used by a game module (e.g. "B" / "W") */
export type Side = string;

export interface Outcome {
  winner: Side | null;
  draw: boolean;
  scores: Record<Side, number>;
  reason: string;
}
