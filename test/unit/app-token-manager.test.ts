import { describe, test, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import { createVerify, generateKeyPairSync } from "node:crypto";
import {
  GitHubAppTokenManager,
  deriveApiHost,
} from "../../src/github/app-token-manager.js";
import { AuthError } from "../../src/shared/errors.js";

const { privateKey, publicKey } = generateKeyPairSync("rsa", {
  modulusLength: 2048,
  privateKeyEncoding: { type: "pkcs8", format: "pem" },
  publicKeyEncoding: { type: "spki", format: "pem" },
});

interface FetchCall {
  url: string;
  method?: string;
  authorization?: string;
}

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
}

describe("deriveApiHost", () => {
  test("maps github.com to api.github.com", () => {
    assert.equal(deriveApiHost("github.com"), "api.github.com");
  });

  test("maps GitHub Enterprise hosts to /api/v3", () => {
    assert.equal(deriveApiHost("ghe.example.com"), "ghe.example.com/api/v3");
  });
});

describe("GitHubAppTokenManager", () => {
  const originalFetch = globalThis.fetch;
  let calls: FetchCall[];
  let responses: Response[];

  beforeEach(() => {
    calls = [];
    responses = [];
    globalThis.fetch = async (input, init) => {
      const headers = new Headers(init?.headers);
      calls.push({
        url: String(input),
        method: init?.method,
        authorization: headers.get("Authorization") ?? undefined,
      });
      const response = responses.shift();
      if (!response) {
        throw new Error(`Unexpected request to ${String(input)}`);
      }
      return response;
    };
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function json(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
  }

  test("signs a verifiable RS256 JWT for the app", () => {
    const manager = new GitHubAppTokenManager("12345", privateKey);
    const jwt = manager.generateJWT();
    const [header, payload, signature] = jwt.split(".");

    assert.deepEqual(decodeSegment(header), { alg: "RS256", typ: "JWT" });
    const claims = decodeSegment(payload);
    assert.ok(typeof claims === "object" && claims !== null && "iss" in claims);
    assert.equal(claims.iss, "12345");

    const verify = createVerify("RSA-SHA256");
    verify.update(`${header}.${payload}`);
    assert.ok(verify.verify(publicKey, Buffer.from(signature, "base64url")));
  });

  test("an unusable key is an AuthError", () => {
    const manager = new GitHubAppTokenManager("12345", "not a key");
    assert.throws(() => manager.generateJWT(), AuthError);
  });

  test("looks up the organization installation", async () => {
    responses.push(json(200, { id: 777, account: { login: "target-org" } }));
    const manager = new GitHubAppTokenManager("12345", privateKey);

    assert.equal(await manager.getOrgInstallationId("target-org"), 777);
    assert.equal(
      calls[0].url,
      "https://api.github.com/orgs/target-org/installation"
    );
    assert.equal(calls[0].method, "GET");
    assert.ok(calls[0].authorization?.startsWith("Bearer "));
  });

  test("uses the enterprise API host", async () => {
    responses.push(json(200, { id: 5 }));
    const manager = new GitHubAppTokenManager("12345", privateKey, {
      host: "ghe.example.com",
    });

    await manager.getOrgInstallationId("target-org");

    assert.equal(
      calls[0].url,
      "https://ghe.example.com/api/v3/orgs/target-org/installation"
    );
  });

  test("creates an installation token", async () => {
    responses.push(
      json(201, {
        token: "test-installation-token",
        expires_at: "2030-01-01T00:00:00Z",
      })
    );
    const manager = new GitHubAppTokenManager("12345", privateKey);

    assert.equal(
      await manager.createInstallationToken(777),
      "test-installation-token"
    );
    assert.equal(
      calls[0].url,
      "https://api.github.com/app/installations/777/access_tokens"
    );
    assert.equal(calls[0].method, "POST");
  });

  test("looks up the app slug", async () => {
    responses.push(json(200, { id: 12345, slug: "ruleset-sync" }));
    const manager = new GitHubAppTokenManager("12345", privateKey);

    assert.equal(await manager.getAppSlug(), "ruleset-sync");
    assert.equal(calls[0].url, "https://api.github.com/app");
    assert.equal(calls[0].method, "GET");
  });

  test("an app response without a slug is an AuthError", async () => {
    responses.push(json(200, { id: 12345 }));
    const manager = new GitHubAppTokenManager("12345", privateKey);

    await assert.rejects(manager.getAppSlug(), {
      name: "AuthError",
      message: "App response has no 'slug'",
    });
  });

  test("an app not installed on the organization is an AuthError", async () => {
    responses.push(json(404, { message: "Not Found" }));
    const manager = new GitHubAppTokenManager("12345", privateKey, {
      retries: 3,
      retryMinTimeout: 0,
    });

    await assert.rejects(manager.getOrgInstallationId("other-org"), {
      name: "AuthError",
      message:
        "Failed to get installation for the app on other-org: GitHub API error: HTTP 404 for https://api.github.com/orgs/other-org/installation",
    });
    assert.equal(calls.length, 1);
  });

  test("retries server errors", async () => {
    responses.push(
      json(502, {}),
      json(200, { token: "test-installation-token" })
    );
    const manager = new GitHubAppTokenManager("12345", privateKey, {
      retries: 1,
      retryMinTimeout: 0,
    });

    assert.equal(
      await manager.createInstallationToken(777),
      "test-installation-token"
    );
    assert.equal(calls.length, 2);
  });

  test("a response without a token is an AuthError", async () => {
    responses.push(json(201, { expires_at: "2030-01-01T00:00:00Z" }));
    const manager = new GitHubAppTokenManager("12345", privateKey);

    await assert.rejects(manager.createInstallationToken(777), {
      message: "Token response for installation 777 has no 'token'",
    });
  });
});
