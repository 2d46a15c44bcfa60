import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import {
  RuleRewriter,
  type RepositoryResolver,
} from "../../src/rulesets/rule-rewriter.js";
import type { RulesetDocument } from "../../src/rulesets/types.js";
import {
  ContextError,
  DecodeError,
  NotFoundInTargetError,
  hasCause,
} from "../../src/shared/errors.js";
import { createMockLogger } from "../mocks/index.js";

function resolverFrom(ids: Record<number, number>): RepositoryResolver & {
  calls: Array<{ id: number; org: string }>;
} {
  const calls: Array<{ id: number; org: string }> = [];
  return {
    calls,
    async resolveRepository(sourceRepoId, sourceOrg) {
      calls.push({ id: sourceRepoId, org: sourceOrg });
      const targetId = ids[sourceRepoId];
      if (targetId === undefined) {
        throw new NotFoundInTargetError(
          "repository",
          "target-org",
          `repo-${sourceRepoId}`
        );
      }
      return targetId;
    },
  };
}

function documentWith(rules: RulesetDocument["rules"]): RulesetDocument {
  return {
    name: "require-ci",
    enforcement: "active",
    source: "source-org",
    rules,
    bypass_actors: [],
  };
}

describe("RuleRewriter", () => {
  test("replaces repository_id and keeps path and ref", async () => {
    const document = documentWith([
      {
        type: "workflows",
        parameters: {
          workflows: [
            {
              repository_id: 1001,
              path: ".github/workflows/ci.yml",
              ref: "main",
            },
          ],
        },
      },
    ]);
    const resolver = resolverFrom({ 1001: 5001 });
    const { mock } = createMockLogger();

    const result = await new RuleRewriter(resolver, mock).rewrite(document);

    assert.deepEqual(document.rules[0].parameters, {
      workflows: [
        { repository_id: 5001, path: ".github/workflows/ci.yml", ref: "main" },
      ],
    });
    assert.deepEqual(result, { rulesRewritten: 1, workflowsRewritten: 1 });
    assert.deepEqual(resolver.calls, [{ id: 1001, org: "source-org" }]);
  });

  test("leaves other rules untouched", async () => {
    const pullRequest = {
      type: "pull_request",
      parameters: { required_approving_review_count: 1 },
    };
    const document = documentWith([pullRequest, { type: "deletion" }]);
    const resolver = resolverFrom({});
    const { mock } = createMockLogger();

    const result = await new RuleRewriter(resolver, mock).rewrite(document);

    assert.deepEqual(document.rules, [
      {
        type: "pull_request",
        parameters: { required_approving_review_count: 1 },
      },
      { type: "deletion" },
    ]);
    assert.deepEqual(result, { rulesRewritten: 0, workflowsRewritten: 0 });
    assert.equal(resolver.calls.length, 0);
  });

  test("keeps extra workflows parameters", async () => {
    const document = documentWith([
      {
        type: "workflows",
        parameters: {
          do_not_enforce_on_create: true,
          workflows: [
            { repository_id: 1, path: "a.yml" },
            { repository_id: 2, path: "b.yml" },
          ],
        },
      },
    ]);
    const { mock } = createMockLogger();

    const rewriter = new RuleRewriter(resolverFrom({ 1: 11, 2: 22 }), mock);
    const result = await rewriter.rewrite(document);

    assert.deepEqual(document.rules[0].parameters, {
      do_not_enforce_on_create: true,
      workflows: [
        { repository_id: 11, path: "a.yml" },
        { repository_id: 22, path: "b.yml" },
      ],
    });
    assert.equal(result.workflowsRewritten, 2);
  });

  test("a failed lookup leaves the rule as loaded", async () => {
    const parameters = {
      workflows: [
        { repository_id: 1, path: "a.yml" },
        { repository_id: 404, path: "b.yml" },
      ],
    };
    const document = documentWith([{ type: "workflows", parameters }]);
    const logger = createMockLogger();

    await assert.rejects(
      new RuleRewriter(resolverFrom({ 1: 11 }), logger.mock).rewrite(document),
      (error: unknown) => {
        assert.ok(error instanceof ContextError);
        assert.equal(
          error.message,
          "Failed to process workflows in ruleset require-ci: repository ID 404: No repository named 'repo-404' found in target organization target-org"
        );
        assert.ok(hasCause(error, NotFoundInTargetError));
        return true;
      }
    );
    assert.equal(document.rules[0].parameters, parameters);
    assert.deepEqual(logger.messages("error"), [
      "Failed to resolve repository 404 for workflow b.yml",
    ]);
  });

  test("wraps malformed workflows parameters", async () => {
    const document = documentWith([{ type: "workflows" }]);
    const logger = createMockLogger();

    await assert.rejects(
      new RuleRewriter(resolverFrom({}), logger.mock).rewrite(document),
      (error: unknown) => {
        assert.ok(error instanceof ContextError);
        assert.equal(
          error.message,
          "Failed to process workflows in ruleset require-ci: workflows rule has no parameters"
        );
        assert.ok(hasCause(error, DecodeError));
        return true;
      }
    );
    assert.deepEqual(logger.messages("error"), [
      "Failed to decode workflow parameters in ruleset require-ci",
    ]);
  });
});
