import { describe, expect, it } from "vitest";
import { isTransientStoreError, isUniqueViolation, pgErrorCode } from "./errors.js";

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("pgErrorCode", () => {
  it("reads a top-level code", () => {
    expect(pgErrorCode(withCode("boom", "23505"))).toBe("23505");
  });

  it("follows the cause chain", () => {
    const wrapped = new Error("query failed", { cause: withCode("inner", "55P03") });
    expect(pgErrorCode(wrapped)).toBe("55P03");
  });

  it("returns undefined for non-objects", () => {
    expect(pgErrorCode("23505")).toBeUndefined();
    expect(pgErrorCode(null)).toBeUndefined();
  });
});

describe("isUniqueViolation", () => {
  it("matches SQLSTATE 23505", () => {
    expect(isUniqueViolation(withCode("x", "23505"))).toBe(true);
  });

  it("matches the driver message when no code is present", () => {
    expect(isUniqueViolation(new Error('duplicate key value violates unique constraint "uq"'))).toBe(true);
  });

  it("does not match other errors", () => {
    expect(isUniqueViolation(withCode("x", "23503"))).toBe(false);
  });
});

describe("isTransientStoreError", () => {
  it.each(["55P03", "40001", "40P01", "ECONNREFUSED"])("treats %s as transient", (code) => {
    expect(isTransientStoreError(withCode("x", code))).toBe(true);
  });

  it("treats constraint violations as permanent", () => {
    expect(isTransientStoreError(withCode("x", "23505"))).toBe(false);
  });

  it("treats plain errors as permanent", () => {
    expect(isTransientStoreError(new Error("x"))).toBe(false);
  });
});
