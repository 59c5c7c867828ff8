/**
 * Cinder Frontend - IR definitions shared by compiler passes
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./ir/types/index.js";
