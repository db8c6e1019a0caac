export {
  type HistoryEntry,
  type HistoryLedger,
  sanitizeErrorName,
  MemoryHistory,
  FileHistory,
  HistoryFileError,
} from './ledger.js';
