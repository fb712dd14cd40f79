/**
 * Schema barrel export.
 * Wire types for records and validation reports.
 */

export { RecordLocation } from "./record.js";

export {
  ErrorKind,
  LineageReason,
  RecordKind,
  AcceptedEntry,
  RejectedEntry,
  ReportEntry,
  RegistryVersion,
  RegistrySnapshot,
  ValidationSummary,
  PassResult,
} from "./report.js";
