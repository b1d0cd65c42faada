import { InvalidStyleError } from "../errors";
import { STYLE_IDS, STYLES, Style, StyleId, isStyleId } from "../rewrite/styles";

type ModeListener = (style: Style) => void;

/**
 * Current output style and its cycle order. The selection is in-memory only
 * and starts from the configured default on every launch.
 */
export class ModeManager {
  private index: number;
  private readonly listeners = new Set<ModeListener>();

  constructor(
    initial: StyleId = "clean",
    private readonly order: readonly StyleId[] = STYLE_IDS
  ) {
    if (order.length === 0) {
      throw new InvalidStyleError(initial, order);
    }
    const idx = order.indexOf(initial);
    if (idx < 0) {
      throw new InvalidStyleError(initial, order);
    }
    this.index = idx;
  }

  current(): Style {
    return STYLES[this.order[this.index]];
  }

  cycle(): Style {
    this.index = (this.index + 1) % this.order.length;
    return this.notify();
  }

  set(style: string): Style {
    const idx = isStyleId(style) ? this.order.indexOf(style) : -1;
    if (idx < 0) {
      throw new InvalidStyleError(style, this.order);
    }
    this.index = idx;
    return this.notify();
  }

  list(): Style[] {
    return this.order.map((id) => STYLES[id]);
  }

  onChange(listener: ModeListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(): Style {
    const style = this.current();
    for (const listener of this.listeners) {
      listener(style);
    }
    return style;
  }
}
