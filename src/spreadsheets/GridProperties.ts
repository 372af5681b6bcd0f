import type { sheets_v4 } from "googleapis";

/**
 * Dimensions of a grid sheet
 */
export class GridProperties {
  constructor(public rowCount: number, public columnCount: number) {}

  /**
   * @throws Error if the item lacks rowCount or columnCount
   */
  static fromItem(item: sheets_v4.Schema$GridProperties): GridProperties {
    if (item.rowCount == null || item.columnCount == null) {
      throw new Error("Grid properties must have rowCount and columnCount");
    }
    return new GridProperties(item.rowCount, item.columnCount);
  }

  toItem(): sheets_v4.Schema$GridProperties {
    return {
      rowCount: this.rowCount,
      columnCount: this.columnCount,
    };
  }
}
