import test from "node:test";
import assert from "node:assert/strict";
import { parseScalar } from "../scalar";
import { ParseError } from "../errors";

test("parseScalar reads integers", () => {
  assert.equal(parseScalar("42"), 42);
  assert.equal(parseScalar("-7"), -7);
  assert.equal(parseScalar("+3"), 3);
  assert.equal(parseScalar(" 12\n"), 12);
});

test("parseScalar falls back to floats", () => {
  assert.equal(parseScalar("1.5"), 1.5);
  assert.equal(parseScalar(".25"), 0.25);
  assert.equal(parseScalar("2e3"), 2000);
  assert.equal(parseScalar("-1.5E-1"), -0.15);
  assert.equal(parseScalar("inf"), Number.POSITIVE_INFINITY);
  assert.equal(parseScalar("-Infinity"), Number.NEGATIVE_INFINITY);
  assert.ok(Number.isNaN(parseScalar("nan")));
});

test("parseScalar rejects tokens that are not numbers", () => {
  for (const token of ["abc", "", "1.2.3", "12ms", "0x10"]) {
    assert.throws(
      () => parseScalar(token),
      (error: unknown) => error instanceof ParseError && error.token === token,
    );
  }
});
