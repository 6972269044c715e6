export { Table, type RowPredicate, type TableOptions } from "./lib/table.js";
export { Row } from "./lib/row.js";
export { Cell } from "./lib/cell.js";
export { Column } from "./lib/column.js";
export {
	Constraint,
	Width,
	TABLE_COMPONENTS,
	type ArrangementMode,
	type CellAlignment,
	type Padding,
	type TableComponent,
} from "./lib/types.js";
export * as presets from "./lib/presets.js";
export { DEFAULT_TABLE_CONFIG, type StylingMode, type TableConfig } from "./lib/config.js";
export { ColumnNotFoundError, ErrorCode, InvalidPresetError, TableError } from "./lib/errors.js";
export { initLogger, type LogClient, type LogLevel, type LogRecord } from "./lib/logger.js";
export { getTerminalSize, isInteractiveTerminal, type TerminalSize } from "./lib/terminal.js";
export type { Attribute, CellStyle, Color, NamedColor } from "./lib/styling.js";
export { displayWidth, stripStyles } from "./lib/width.js";
export {
	arrangeContent,
	type ColumnBounds,
	type ColumnLayout,
	type ContentArrangement,
	type ContentScan,
	type LayoutSource,
} from "./lib/arrangement/index.js";
export { MIN_FREE_CHARS, repairStyles, splitLongWord, truncateLines, wrapCell, wrapLine } from "./lib/format/wrap.js";
