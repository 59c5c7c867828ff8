/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "CDR3001",
        "error",
        "Test error",
        {
          file: "main.cdr",
          line: 10,
          column: 5,
          length: 10,
        },
        "Try this instead"
      );

      expect(diagnostic.code).to.equal("CDR3001");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.message).to.equal("Test error");
      expect(diagnostic.location?.file).to.equal("main.cdr");
      expect(diagnostic.hint).to.equal("Try this instead");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("CDR3002", "warning", "Test warning");

      expect(diagnostic.location).to.equal(undefined);
      expect(diagnostic.hint).to.equal(undefined);
    });
  });

  describe("formatDiagnostic", () => {
    it("should format with location and hint", () => {
      const diagnostic = createDiagnostic(
        "CDR3004",
        "error",
        "'f' expects 1 compile-time argument(s), got 2",
        { file: "main.cdr", line: 3, column: 7, length: 4 },
        "Remove the extra argument"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "main.cdr:3:7 error CDR3004: 'f' expects 1 compile-time argument(s), got 2 Hint: Remove the extra argument"
      );
    });

    it("should format without location", () => {
      const diagnostic = createDiagnostic("CDR3003", "warning", "Left unchanged");

      expect(formatDiagnostic(diagnostic)).to.equal(
        "warning CDR3003: Left unchanged"
      );
    });
  });

  describe("isError", () => {
    it("should only treat error severity as an error", () => {
      expect(isError(createDiagnostic("CDR3001", "error", "e"))).to.equal(true);
      expect(isError(createDiagnostic("CDR3002", "warning", "w"))).to.equal(
        false
      );
      expect(isError(createDiagnostic("CDR3002", "info", "i"))).to.equal(false);
    });
  });

  describe("DiagnosticsCollector", () => {
    it("should start empty", () => {
      const collector = createDiagnosticsCollector();

      expect(collector.diagnostics).to.deep.equal([]);
      expect(collector.hasErrors).to.equal(false);
    });

    it("should stay error-free while only warnings are added", () => {
      const collector = addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic("CDR3003", "warning", "w")
      );

      expect(collector.diagnostics).to.have.lengthOf(1);
      expect(collector.hasErrors).to.equal(false);
    });

    it("should remember an error once added", () => {
      const withError = addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic("CDR3001", "error", "e")
      );
      const after = addDiagnostic(
        withError,
        createDiagnostic("CDR3003", "warning", "w")
      );

      expect(after.hasErrors).to.equal(true);
      expect(after.diagnostics.map((d) => d.code)).to.deep.equal([
        "CDR3001",
        "CDR3003",
      ]);
    });

    it("should not modify the previous collector", () => {
      const empty = createDiagnosticsCollector();
      addDiagnostic(empty, createDiagnostic("CDR3001", "error", "e"));

      expect(empty.diagnostics).to.have.lengthOf(0);
      expect(empty.hasErrors).to.equal(false);
    });
  });
});
