import { test, describe } from "node:test";
import { strict as assert } from "node:assert";
import { escapeShellArg } from "../../src/shared/shell-utils.js";

describe("escapeShellArg", () => {
  test("wraps plain values in single quotes", () => {
    assert.equal(escapeShellArg("orgs/acme/rulesets"), "'orgs/acme/rulesets'");
  });

  test("escapes embedded single quotes", () => {
    assert.equal(escapeShellArg("it's"), "'it'\\''s'");
  });

  test("leaves shell metacharacters inert", () => {
    assert.equal(escapeShellArg("$(rm -rf /); `x`"), "'$(rm -rf /); `x`'");
  });
});
