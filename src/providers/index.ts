export type {
  ILogProvider,
  LogEvent,
  LogLevel,
  OperationLogEvent,
  OperationOutcome,
} from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type { IWorkbookReader, Workbook, Sheet, SheetRow, CellValue } from './IWorkbookReader.js';
export { workbookFromSheets } from './IWorkbookReader.js';
export { XlsxWorkbookReader } from './XlsxWorkbookReader.js';
