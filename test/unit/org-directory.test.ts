import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { GhApi } from "../../src/github/gh-api.js";
import { GhOrganizationDirectory } from "../../src/github/org-directory.js";
import { UpstreamApiError } from "../../src/shared/errors.js";
import { createMockExecutor, ghError } from "../mocks/index.js";

const NOT_FOUND = ghError("gh: Not Found (HTTP 404)");

function directoryWith(responses: Array<[string, string | Error]>) {
  const executor = createMockExecutor({ responses: new Map(responses) });
  const directory = new GhOrganizationDirectory({
    executor: executor.mock,
    token: "test-secret",
    retries: 0,
  });
  return { executor, directory };
}

describe("GhOrganizationDirectory", () => {
  test("getRepoId reads the repository", async () => {
    const { directory, executor } = directoryWith([
      ["'repos/target-org/ci-workflows'", '{"id":5001,"name":"ci-workflows"}'],
    ]);
    assert.equal(await directory.getRepoId("target-org", "ci-workflows"), 5001);
    assert.equal(
      executor.calls[0].command,
      "GH_TOKEN='test-secret' gh api 'repos/target-org/ci-workflows'"
    );
  });

  test("getRepoId is null for a missing repository", async () => {
    const { directory } = directoryWith([["repos/", NOT_FOUND]]);
    assert.equal(await directory.getRepoId("target-org", "gone"), null);
  });

  test("getRepoName looks the repository up by ID", async () => {
    const { directory, executor } = directoryWith([
      ["'repositories/1001'", '{"id":1001,"name":"ci-workflows"}'],
    ]);
    assert.equal(await directory.getRepoName(1001), "ci-workflows");
    assert.equal(executor.calls.length, 1);
  });

  test("getOrgId reads the organization", async () => {
    const { directory } = directoryWith([
      ["'orgs/source-org'", '{"id":1,"login":"source-org"}'],
    ]);
    assert.equal(await directory.getOrgId("source-org"), 1);
  });

  test("getTeamById uses the organization ID", async () => {
    const { directory, executor } = directoryWith([
      [
        "'organizations/1/team/42'",
        '{"id":42,"slug":"release-captains","name":"Release Captains","privacy":"closed"}',
      ],
    ]);
    assert.deepEqual(await directory.getTeamById(1, 42), {
      id: 42,
      slug: "release-captains",
      name: "Release Captains",
    });
    assert.equal(executor.calls.length, 1);
  });

  test("getTeamBySlug is null for a missing team", async () => {
    const { directory } = directoryWith([
      ["'orgs/target-org/teams/nobody'", NOT_FOUND],
    ]);
    assert.equal(await directory.getTeamBySlug("target-org", "nobody"), null);
  });

  test("getCustomRepoRoles lists the roles", async () => {
    const { directory } = directoryWith([
      [
        "custom-repository-roles",
        '{"total_count":2,"custom_roles":[{"id":7001,"name":"maintainer-lite","base_role":"write"},{"id":7002,"name":"auditor"}]}',
      ],
    ]);
    assert.deepEqual(await directory.getCustomRepoRoles("source-org"), [
      { id: 7001, name: "maintainer-lite" },
      { id: 7002, name: "auditor" },
    ]);
  });

  test("getCustomRepoRoles is empty when the feature is unavailable", async () => {
    const { directory } = directoryWith([
      ["custom-repository-roles", NOT_FOUND],
    ]);
    assert.deepEqual(await directory.getCustomRepoRoles("free-org"), []);
  });

  test("rejects responses missing the expected field", async () => {
    const { directory } = directoryWith([
      ["'orgs/source-org'", '{"login":"source-org"}'],
    ]);
    await assert.rejects(directory.getOrgId("source-org"), {
      message: "GitHub API orgs/source-org returned no numeric 'id'",
    });
  });

  test("surfaces other failures as UpstreamApiError", async () => {
    const { directory } = directoryWith([
      [
        "'orgs/source-org'",
        ghError("gh: Resource not accessible by integration (HTTP 403)"),
      ],
    ]);
    await assert.rejects(
      directory.getOrgId("source-org"),
      (error: unknown) =>
        error instanceof UpstreamApiError && error.status === 403
    );
  });

  test("accepts a shared GhApi", async () => {
    const executor = createMockExecutor({ defaultResponse: '{"id":3}' });
    const directory = new GhOrganizationDirectory(
      new GhApi({ executor: executor.mock })
    );
    assert.equal(await directory.getOrgId("acme"), 3);
  });
});
