import { describe, test, before, after } from "node:test";
import { strict as assert } from "node:assert";
import { tmpdir } from "node:os";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  CommandError,
  ShellCommandExecutor,
  defaultExecutor,
} from "../../src/shared/command-executor.js";

describe("ShellCommandExecutor", () => {
  const executor = new ShellCommandExecutor();
  let testDir: string;

  before(() => {
    testDir = mkdtempSync(join(tmpdir(), "rulesetbot-exec-"));
  });

  after(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test("returns trimmed stdout", async () => {
    assert.equal(await executor.exec("echo '  hello  '", testDir), "hello");
  });

  test("runs in the given working directory", async () => {
    writeFileSync(join(testDir, "protect-main.json"), "{}");
    assert.equal(
      await executor.exec("ls protect-main.json", testDir),
      "protect-main.json"
    );
  });

  test("passes extra environment variables", async () => {
    const result = await executor.exec("echo $RULESETBOT_TEST_VALUE", testDir, {
      env: { RULESETBOT_TEST_VALUE: "from-env" },
    });
    assert.equal(result, "from-env");
  });

  test("rejects with CommandError carrying stderr and status", async () => {
    await assert.rejects(
      executor.exec("echo 'gh: Not Found (HTTP 404)' >&2; exit 3", testDir),
      (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.equal(error.stderr, "gh: Not Found (HTTP 404)\n");
        assert.equal(error.status, 3);
        return true;
      }
    );
  });

  test("masks tokens in the error", async () => {
    await assert.rejects(
      executor.exec("GH_TOKEN='test-secret' false", testDir),
      (error: unknown) => {
        assert.ok(error instanceof CommandError);
        assert.ok(!error.message.includes("test-secret"));
        return true;
      }
    );
  });
});

describe("defaultExecutor", () => {
  test("is a ShellCommandExecutor", () => {
    assert.ok(defaultExecutor instanceof ShellCommandExecutor);
  });
});
