export { columnIndex, DEFAULT_COLUMNS, lastColumn, quoteSheetName } from "./columns";
export type { ColumnMap } from "./columns";
export { createGoogleSheetsClient, GoogleSheetGateway } from "./gateway";
export type { SheetValuesClient } from "./gateway";
