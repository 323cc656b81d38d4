export interface VisibleColumn {
  /** 1-based index among columns with a non-empty header. */
  ordinal: number;
  /** 0-based index in the sheet's used range. */
  position: number;
  header: string;
}

export interface KeyedColumn extends VisibleColumn {
  key: string;
}
