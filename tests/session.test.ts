import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { RelayError } from "../src/errors.js";
import { UpstreamImageUploader } from "../src/images/upload.js";
import type { CookieLease } from "../src/pool/cookiePool.js";
import { buildRequestBody } from "../src/prompt/requestBody.js";
import { RelaySession } from "../src/relay/session.js";
import { UpstreamClient } from "../src/relay/upstream.js";
import { CapturingPool, FakeClaude, jsonResponse, TEST_ENDPOINT, TEST_ORG } from "./helpers/fakeClaude.js";
import { silentLogger } from "./helpers/logger.js";

const config = loadConfig({});

async function openSession(fake: FakeClaude, lease?: CookieLease, withUploader = false) {
  const pool = new CapturingPool(lease);
  const client = new UpstreamClient(TEST_ENDPOINT, fake.fetch);
  const session = await RelaySession.open({
    config,
    client,
    pool,
    logger: silentLogger,
    rid: "req-test",
    imageUploader: withUploader ? new UpstreamImageUploader(client, config.upstreamErrorPatterns, silentLogger) : undefined,
  });
  return { pool, session };
}

function turn(images: Array<{ type: "base64"; media_type: string; data: string }> = []) {
  return buildRequestBody({
    prompt: "Human: hi",
    maxTokens: 64,
    messagesApi: true,
    timezone: "UTC",
    pastePrompt: false,
    customPrompt: "",
    images,
  });
}

describe("RelaySession organization", () => {
  it("picks the first chat-capable organization and reads the plan", async () => {
    const fake = new FakeClaude().on("organizations", () =>
      jsonResponse([
        { uuid: "org-api", capabilities: ["api"] },
        { uuid: "org-pro", capabilities: ["chat", "claude_pro"] },
      ]),
    );
    const { session } = await openSession(fake);

    await session.resolveOrganization();
    expect(session.orgUuid).toBe("org-pro");
    expect(session.isPro).toBe(true);
  });

  it("skips discovery when the organization and plan are known", async () => {
    const fake = new FakeClaude();
    const { session } = await openSession(fake, { id: 3, cookie: "sessionKey=test-cookie", orgUuid: "org-9", isPro: false });

    await session.resolveOrganization();
    expect(fake.calls).toEqual([]);
    expect(session.orgUuid).toBe("org-9");
    expect(session.cookieId).toBe(3);
  });

  it("fails with no_valid_key without a chat organization", async () => {
    const fake = new FakeClaude().on("organizations", () => jsonResponse([{ uuid: "org-api", capabilities: [] }]));
    const { session } = await openSession(fake);
    await expect(session.resolveOrganization()).rejects.toMatchObject({ code: "no_valid_key" });
  });

  it("carries rotated cookies back to the pool", async () => {
    const fake = new FakeClaude().on("organizations", () =>
      jsonResponse([{ uuid: TEST_ORG, capabilities: ["chat"] }], 200, { "set-cookie": "sessionKey=rotated; Path=/" }),
    );
    const { pool, session } = await openSession(fake);

    await session.resolveOrganization();
    await session.release(null);

    expect(session.cookie).toBe("sessionKey=rotated");
    expect(pool.returned).toEqual([
      { lease: { id: 0, cookie: "sessionKey=rotated", orgUuid: TEST_ORG, isPro: false }, reason: null },
    ]);
  });
});

describe("RelaySession conversations", () => {
  it("creates a conversation and completes in it", async () => {
    const fake = new FakeClaude();
    const { session } = await openSession(fake);
    await session.resolveOrganization();

    const uuid = await session.createConversation({ model: "claude-3-opus-20240229" });
    const response = await session.complete(turn(), { stream: true });

    expect(response.status).toBe(200);
    expect(session.convUuid).toBe(uuid);
    expect(session.convDepth).toBe(1);
    expect(fake.callsTo("create")[0]?.body).toEqual({ uuid, name: "" });

    const completion = fake.callsTo("completion")[0];
    expect(completion?.path).toBe(`/api/organizations/${TEST_ORG}/chat_conversations/${uuid}/completion`);
    expect(completion?.headers.get("accept")).toBe("text/event-stream");
    expect(completion?.headers.get("referer")).toBe(`${TEST_ENDPOINT}/chat/${uuid}`);
  });

  it("asks for extended thinking with the model when requested", async () => {
    const fake = new FakeClaude();
    const { session } = await openSession(fake);
    await session.resolveOrganization();

    const uuid = await session.createConversation({
      model: "claude-3-7-sonnet-20250219--force",
      thinking: { type: "enabled", budget_tokens: 1024 },
    });
    expect(fake.callsTo("create")[0]?.body).toEqual({
      uuid,
      name: "",
      paprika_mode: "extended",
      model: "claude-3-7-sonnet-20250219",
    });
  });

  it("replaces a live conversation instead of keeping two", async () => {
    const fake = new FakeClaude();
    const { session } = await openSession(fake);
    await session.resolveOrganization();

    const first = await session.createConversation({ model: "m" });
    const second = await session.createConversation({ model: "m" });

    expect(second).not.toBe(first);
    expect(fake.callsTo("delete").map((call) => call.path)).toEqual([
      `/api/organizations/${TEST_ORG}/chat_conversations/${first}`,
    ]);
  });

  it("uploads images and references them in the turn", async () => {
    const fake = new FakeClaude();
    const { session } = await openSession(fake, undefined, true);
    await session.resolveOrganization();
    await session.createConversation({ model: "m" });

    await session.complete(turn([{ type: "base64", media_type: "image/png", data: "AAAA" }]), { stream: false });

    expect(fake.callsTo("upload")[0]?.path).toBe(`/api/${TEST_ORG}/upload`);
    expect(fake.callsTo("completion")[0]?.body).toMatchObject({ files: ["file-1"] });
  });
});

describe("RelaySession release", () => {
  it("deletes the conversation and returns the cookie exactly once", async () => {
    const fake = new FakeClaude();
    const { pool, session } = await openSession(fake);
    await session.resolveOrganization();
    await session.createConversation({ model: "m" });

    await session.release(new RelayError("too_many_request", "slow", { retryAfterSec: 30 }));
    await session.release(null);

    expect(session.isReleased).toBe(true);
    expect(session.convUuid).toBeUndefined();
    expect(fake.callsTo("delete")).toHaveLength(1);
    expect(pool.returned).toHaveLength(1);
    expect(pool.returned[0]?.reason).toEqual({ kind: "exhausted", retryAfterSec: 30 });
  });

  it("still returns the cookie when deletion fails", async () => {
    const fake = new FakeClaude().on("delete", () => jsonResponse({ error: { message: "nope" } }, 500));
    const { pool, session } = await openSession(fake);
    await session.resolveOrganization();
    await session.createConversation({ model: "m" });

    await expect(session.release(null)).resolves.toBeUndefined();
    expect(pool.returned).toHaveLength(1);
  });

  it("deletes a conversation whose creation failed", async () => {
    const fake = new FakeClaude().on("create", () => jsonResponse({ error: { message: "boom" } }, 500));
    const { pool, session } = await openSession(fake);
    await session.resolveOrganization();

    await expect(session.createConversation({ model: "m" })).rejects.toMatchObject({ code: "upstream" });
    await session.release(null);

    expect(fake.callsTo("delete")).toHaveLength(1);
    expect(pool.returned).toHaveLength(1);
  });
});
