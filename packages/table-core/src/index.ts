export { alphabetToInt, intToAlphabet } from "./alphabet";
export { Coordinate } from "./coordinate";
export type { CoordinateLike } from "./coordinate";
export { Size } from "./size";
export type { SizeLike } from "./size";
export { Box } from "./box";
export type { BoxTransform } from "./box";
export { DEFAULT_NATURE, Styled } from "./styled";
export type { Styles } from "./styled";
export { appendContent, Cell, cellText } from "./cell";
export type { CellContent, CellOptions, ContentAppender, MarkupNode } from "./cell";
export { Grid, insertCellSorted } from "./grid";
export type { ExpandOptions, GridOptions } from "./grid";
export { Table } from "./table";
export type { FillMissingOptions, TableOptions } from "./table";
export { ColView, RowView, TableView, TableViewList } from "./views";
export type { InsertCellOptions } from "./views";
export { defaultTile, draw, iterLines, TITLE_PLACEHOLDER } from "./drawing";
export type { DrawableGrid, TileEdges, TileRenderer } from "./drawing";
export {
  CellNotFoundError,
  CollisionError,
  InvalidBoundsError,
  isTableGridError,
  MergeError,
  TableGridError
} from "./errors";
export type { TableGridErrorKind } from "./errors";
export { getConfig, getDefaultLogger, loadConfigFromEnv } from "./config";
export type { CollisionMode, TableCoreConfig } from "./config";
export { createLogger } from "./logger";
export type { CreateLoggerOptions, Logger } from "./logger";
export { CellSnapshotSchema, fromSnapshot, TableSnapshotSchema, toSnapshot } from "./snapshot";
export type { CellSnapshot, SnapshotContent, TableSnapshot } from "./snapshot";
