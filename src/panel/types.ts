import type { PageName } from "../config/schema.js";
import type { Snapshot } from "../snapshot/types.js";

export interface FrameView {
  page: PageName;
  ticker: string;
}

/** Pure: the same snapshot and view always produce the same frame. */
export type Renderer<F> = (snapshot: Snapshot, view: FrameView) => F;

export interface FrameSink<F> {
  show(frame: F): void | Promise<void>;
}
