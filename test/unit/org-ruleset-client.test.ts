import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import {
  GhOrgRulesetClient,
  toRulesetPayload,
} from "../../src/github/org-ruleset-client.js";
import type { RulesetDocument } from "../../src/rulesets/types.js";
import { createMockExecutor } from "../mocks/index.js";

const DOCUMENT: RulesetDocument = {
  name: "protect-main",
  enforcement: "active",
  source: "source-org",
  conditions: { ref_name: { include: ["~DEFAULT_BRANCH"], exclude: [] } },
  rules: [
    { type: "deletion" },
    {
      type: "pull_request",
      parameters: { required_approving_review_count: 1 },
    },
  ],
  bypass_actors: [
    { actor_id: 99, actor_type: "Team", bypass_mode: "always" },
    { actor_id: null, actor_type: "DeployKey" },
  ],
};

describe("toRulesetPayload", () => {
  test("drops source and defaults the target to branch", () => {
    assert.deepEqual(toRulesetPayload(DOCUMENT), {
      name: "protect-main",
      target: "branch",
      enforcement: "active",
      rules: [
        { type: "deletion" },
        {
          type: "pull_request",
          parameters: { required_approving_review_count: 1 },
        },
      ],
      bypass_actors: [
        { actor_id: 99, actor_type: "Team", bypass_mode: "always" },
        { actor_id: null, actor_type: "DeployKey" },
      ],
      conditions: { ref_name: { include: ["~DEFAULT_BRANCH"], exclude: [] } },
    });
  });

  test("keeps an explicit target and omits absent conditions", () => {
    const payload = toRulesetPayload({
      name: "protect-tags",
      enforcement: "evaluate",
      source: "source-org",
      target: "tag",
      rules: [],
      bypass_actors: [],
    });
    assert.equal(payload.target, "tag");
    assert.equal("conditions" in payload, false);
  });
});

describe("GhOrgRulesetClient", () => {
  test("lists organization rulesets", async () => {
    const executor = createMockExecutor({
      defaultResponse:
        '[{"id":1,"name":"protect-main","enforcement":"active","source_type":"Organization"},{"id":2,"name":"protect-dev","enforcement":"evaluate"}]',
    });
    const client = new GhOrgRulesetClient({
      executor: executor.mock,
      token: "test-secret",
    });

    assert.deepEqual(await client.list("target-org"), [
      { id: 1, name: "protect-main", enforcement: "active" },
      { id: 2, name: "protect-dev", enforcement: "evaluate" },
    ]);
    assert.equal(
      executor.calls[0].command,
      "GH_TOKEN='test-secret' gh api 'orgs/target-org/rulesets?per_page=100'"
    );
  });

  test("creates a ruleset with POST", async () => {
    const executor = createMockExecutor({
      defaultResponse:
        '{"id":314,"name":"protect-main","enforcement":"active"}',
    });
    const client = new GhOrgRulesetClient({ executor: executor.mock });

    const created = await client.create("target-org", DOCUMENT);

    assert.deepEqual(created, {
      id: 314,
      name: "protect-main",
      enforcement: "active",
    });
    const { command } = executor.calls[0];
    assert.ok(
      command.endsWith("| gh api -X POST 'orgs/target-org/rulesets' --input -")
    );
    assert.ok(
      command.includes(
        '"bypass_actors":[{"actor_id":99,"actor_type":"Team","bypass_mode":"always"}'
      )
    );
    assert.equal(command.includes("source-org"), false);
  });

  test("updates a ruleset with PUT", async () => {
    const executor = createMockExecutor({
      defaultResponse:
        '{"id":314,"name":"protect-main","enforcement":"active"}',
    });
    const client = new GhOrgRulesetClient({ executor: executor.mock });

    await client.update("target-org", 314, DOCUMENT);

    assert.ok(
      executor.calls[0].command.endsWith(
        "| gh api -X PUT 'orgs/target-org/rulesets/314' --input -"
      )
    );
  });

  test("rejects an unexpected list response", async () => {
    const executor = createMockExecutor({
      defaultResponse: '{"message":"oops"}',
    });
    const client = new GhOrgRulesetClient({ executor: executor.mock });
    await assert.rejects(client.list("target-org"), {
      message:
        "GitHub API orgs/target-org/rulesets?per_page=100 returned no ruleset list",
    });
  });
});
