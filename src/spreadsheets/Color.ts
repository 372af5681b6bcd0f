import type { sheets_v4 } from "googleapis";

/**
 * RGB color as used by sheet tab colors
 *
 * Channels are floats in [0, 1]. The API omits zero channels, so missing
 * channels read as 0.
 */
export class Color {
  constructor(
    public red: number = 0,
    public green: number = 0,
    public blue: number = 0
  ) {}

  static fromItem(item: sheets_v4.Schema$Color): Color {
    return new Color(item.red ?? 0, item.green ?? 0, item.blue ?? 0);
  }

  toItem(): sheets_v4.Schema$Color {
    return {
      red: this.red,
      green: this.green,
      blue: this.blue,
    };
  }
}
