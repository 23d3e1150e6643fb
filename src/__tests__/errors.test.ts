/**
 * Tests for storage error helpers
 */

import { describe, it, expect } from "vitest";

import { StorageError, toStorageError } from "../errors.js";

describe("toStorageError", () => {
  it("keeps StorageErrors as they are", () => {
    const original = new StorageError("duplicate_id", "Task a already exists");
    expect(toStorageError(original)).toBe(original);
  });

  it("wraps other errors as write failures by default", () => {
    const cause = new Error("disk I/O error");
    const wrapped = toStorageError(cause);

    expect(wrapped.kind).toBe("write_failed");
    expect(wrapped.message).toBe("disk I/O error");
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.name).toBe("StorageError");
  });

  it("wraps non-errors with the given kind", () => {
    const wrapped = toStorageError("no database", "unavailable");
    expect(wrapped.kind).toBe("unavailable");
    expect(wrapped.message).toBe("no database");
  });
});
