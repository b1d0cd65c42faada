import type { IOverlayPresenter } from "../types/contracts";

/** Headless operation: accepts every update and shows nothing. */
export class NullOverlay implements IOverlayPresenter {
  show(): void {}
  amplitude(): void {}
  mode(): void {}
  autoPaste(): void {}
  dispose(): void {}
}
