import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  CompilerInvariantError,
  ConfigurationError,
  DatabaseOperationError,
  getErrorSuggestion,
  isPagewiseError,
  isSystemError,
  isUserRecoverable,
  PagewiseError,
  ReselectNotAllowedError,
  UnsupportedDialectError,
  ValidationError,
} from "../src/errors";
import { validateInput } from "../src/errors/validation";

describe("PagewiseError", () => {
  it("carries code, category and frozen details", () => {
    const error = new PagewiseError("Something failed", "SOME_CODE", {
      category: "user",
      details: { field: "limit" },
    });

    expect(error.message).toBe("Something failed");
    expect(error.code).toBe("SOME_CODE");
    expect(error.category).toBe("user");
    expect(error.details).toEqual({ field: "limit" });
    expect(Object.isFrozen(error.details)).toBe(true);
    expect(error).toBeInstanceOf(Error);
  });

  it("appends the suggestion to the user message", () => {
    const error = new PagewiseError("Bad input", "BAD", {
      category: "user",
      suggestion: "Fix it",
    });

    expect(error.toUserMessage()).toBe("Bad input\n\nSuggestion: Fix it");
  });

  it("returns the bare message without a suggestion", () => {
    const error = new PagewiseError("Bad input", "BAD", { category: "user" });

    expect(error.toUserMessage()).toBe("Bad input");
    expect(error.suggestion).toBeUndefined();
  });

  it("formats a log string with details and cause", () => {
    const error = new PagewiseError("Failed", "FAIL", {
      category: "system",
      details: { queryId: "q1" },
      cause: "disk full",
    });

    expect(error.toLogString()).toBe(
      [
        "[FAIL] Failed",
        "  Category: system",
        '  Details: {"queryId":"q1"}',
        "  Cause: disk full",
      ].join("\n"),
    );
  });
});

describe("error subclasses", () => {
  it("names the unsupported dialect and lists the supported ones", () => {
    const error = new UnsupportedDialectError("db2", ["default", "oracle"]);

    expect(error.message).toBe('Unsupported SQL dialect: "db2"');
    expect(error.code).toBe("UNSUPPORTED_DIALECT");
    expect(error.details).toEqual({
      dialect: "db2",
      supported: ["default", "oracle"],
    });
    expect(error.suggestion).toBe(
      "Use one of: default, oracle, or pass a custom PaginationDialect.",
    );
  });

  it("identifies the derived query in ReselectNotAllowedError", () => {
    const error = new ReselectNotAllowedError({
      queryId: "abc",
      rootType: "Book",
    });

    expect(error.message).toBe(
      'Query abc on "Book" is derived from another query and cannot be reselected',
    );
    expect(error.name).toBe("ReselectNotAllowedError");
  });

  it("lists the invalid fields in the default validation suggestion", () => {
    const error = new ValidationError("Invalid paging", {
      subject: "paging",
      issues: [
        { path: "limit", message: "Too small" },
        { path: "", message: "Bad" },
      ],
    });

    expect(error.suggestion).toBe(
      "Check the following fields: limit, (root). See error.details.issues for specific validation failures.",
    );
  });

  it("keeps the cause of a database error", () => {
    const cause = new Error("connection reset");
    const error = new DatabaseOperationError(
      "Failed to execute count query",
      { operation: "count", queryId: "q1" },
      { cause },
    );

    expect(error.cause).toBe(cause);
    expect(error.category).toBe("system");
  });
});

describe("error guards", () => {
  it("classifies user and system errors", () => {
    const user = new ConfigurationError("Bad model");
    const system = new CompilerInvariantError("Unreachable");

    expect(isPagewiseError(user)).toBe(true);
    expect(isPagewiseError(new Error("plain"))).toBe(false);
    expect(isUserRecoverable(user)).toBe(true);
    expect(isUserRecoverable(system)).toBe(false);
    expect(isSystemError(system)).toBe(true);
    expect(isSystemError("not an error")).toBe(false);
  });

  it("extracts suggestions only from library errors", () => {
    expect(getErrorSuggestion(new ConfigurationError("Bad model"))).toBe(
      "Review your model definition for errors.",
    );
    expect(getErrorSuggestion(new Error("plain"))).toBeUndefined();
  });
});

describe("validateInput", () => {
  const schema = z.object({ size: z.number().int().positive() });

  it("returns the parsed value", () => {
    expect(validateInput(schema, { size: 3 }, "page request")).toEqual({
      size: 3,
    });
  });

  it("throws a ValidationError naming the subject and each issue", () => {
    let caught: unknown;
    try {
      validateInput(schema, { size: 0 }, "page request");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.message).toBe(
      "Invalid page request: size: Number must be greater than 0",
    );
    expect(caught.details.subject).toBe("page request");
    expect(caught.details.issues).toEqual([
      {
        path: "size",
        message: "Number must be greater than 0",
        code: "too_small",
      },
    ]);
  });
});
