import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { z } from "zod";
import type { RelayConfig } from "../config.js";
import { describeReason, noValidKey, reasonForError, RelayError, toRelayError } from "../errors.js";
import type { ImageUploader } from "../images/upload.js";
import type { Thinking } from "../prompt/clientRequests.js";
import type { Message } from "../prompt/messages.js";
import { upstreamModelName, type UpstreamTurn } from "../prompt/requestBody.js";
import type { CookieLease, CookieSource } from "../pool/cookiePool.js";
import { checkUpstreamResponse } from "./classify.js";
import { mergeSetCookies, readSetCookies, type UpstreamClient, type UpstreamRequest } from "./upstream.js";

const PRO_CAPABILITIES = ["claude_pro", "raven"];

const organizationsSchema = z.array(
  z
    .object({
      uuid: z.string().min(1),
      name: z.string().optional(),
      capabilities: z.array(z.string()).optional().default([]),
    })
    .passthrough(),
);

export interface RelaySessionDependencies {
  config: RelayConfig;
  client: UpstreamClient;
  pool: CookieSource;
  logger: Logger;
  rid: string;
  imageUploader?: ImageUploader;
}

export interface CreateConversationOptions {
  model: string;
  thinking?: Thinking;
}

export interface CompleteOptions {
  stream: boolean;
  signal?: AbortSignal;
}

/**
 * Per-request context: one leased cookie, one organization and at most one
 * live upstream conversation. Owned by the request that opened it.
 */
export class RelaySession {
  public cookie: string;
  public orgUuid: string;
  public isPro?: boolean;
  public convUuid?: string;
  public convDepth = 0;
  public model?: string;
  public prevMessages: Message[] = [];
  public prevImpersonated = false;
  public character?: string;

  private readonly deps: RelaySessionDependencies;
  private readonly lease: CookieLease;
  private released = false;

  private constructor(deps: RelaySessionDependencies, lease: CookieLease) {
    this.deps = deps;
    this.lease = lease;
    this.cookie = lease.cookie;
    this.orgUuid = lease.orgUuid ?? "";
    this.isPro = lease.isPro;
  }

  /** Leases a cookie. From here on `release()` must run exactly once. */
  public static async open(deps: RelaySessionDependencies): Promise<RelaySession> {
    const lease = await deps.pool.acquire();
    deps.logger.debug({ rid: deps.rid, event: "cookie_leased", cookieId: lease.id }, "cookie_leased");
    return new RelaySession(deps, lease);
  }

  public get cookieId(): number {
    return this.lease.id;
  }

  public get isReleased(): boolean {
    return this.released;
  }

  /**
   * Makes sure the session knows its organization and plan. Pinned or
   * previously discovered values are reused without an upstream call.
   */
  public async resolveOrganization(): Promise<void> {
    if (this.orgUuid && this.isPro !== undefined) {
      return;
    }

    const response = await this.exchange({
      method: "GET",
      path: "/api/organizations",
      cookie: this.cookie,
    });
    const parsed = organizationsSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RelayError("upstream", "Unexpected organizations payload", {
        details: { issues: parsed.error.issues.length },
      });
    }

    const chatOrgs = parsed.data.filter((org) => org.capabilities.includes("chat"));
    const chosen = chatOrgs.find((org) => org.uuid === this.orgUuid) ?? chatOrgs[0];
    if (!chosen) {
      throw noValidKey("Cookie has no organization with chat access");
    }

    this.orgUuid = chosen.uuid;
    this.isPro = chosen.capabilities.some((capability) => PRO_CAPABILITIES.includes(capability));
    this.deps.logger.debug(
      { rid: this.deps.rid, event: "organization_resolved", orgUuid: this.orgUuid, isPro: this.isPro },
      "organization_resolved",
    );
  }

  /** Deletes any live conversation, then creates a fresh one. */
  public async createConversation(options: CreateConversationOptions): Promise<string> {
    if (this.convUuid) {
      await this.deleteConversation();
    }

    const uuid = randomUUID();
    const body: Record<string, unknown> = { uuid, name: "" };
    if (options.thinking) {
      body.paprika_mode = "extended";
      body.model = upstreamModelName(options.model);
    }

    // Set before the call: a half-created conversation still gets deleted.
    this.convUuid = uuid;
    this.convDepth = 0;
    await this.exchange({
      method: "POST",
      path: `/api/organizations/${this.orgUuid}/chat_conversations`,
      cookie: this.cookie,
      json: body,
    });

    this.deps.logger.debug({ rid: this.deps.rid, event: "conversation_created", convUuid: uuid }, "conversation_created");
    return uuid;
  }

  /** Sends one turn; the returned response is 2xx with its body unread. */
  public async complete(turn: UpstreamTurn, options: CompleteOptions): Promise<Response> {
    const convUuid = this.convUuid;
    if (!convUuid) {
      throw new RelayError("unknown", "No upstream conversation to complete in");
    }

    const body = { ...turn.body };
    if (turn.images.length > 0 && this.deps.imageUploader) {
      body.files = await this.deps.imageUploader.upload(turn.images, {
        orgUuid: this.orgUuid,
        cookie: this.cookie,
        rid: this.deps.rid,
        signal: options.signal,
      });
    }

    const response = await this.exchange({
      method: "POST",
      path: `/api/organizations/${this.orgUuid}/chat_conversations/${convUuid}/completion`,
      cookie: this.cookie,
      json: body,
      accept: options.stream ? "text/event-stream" : undefined,
      refererPath: `/chat/${convUuid}`,
      signal: options.signal,
    });
    this.convDepth += 1;
    return response;
  }

  /** Idempotent; failures are logged, never thrown. */
  public async deleteConversation(): Promise<void> {
    const convUuid = this.convUuid;
    if (!convUuid) {
      return;
    }
    this.convUuid = undefined;

    try {
      const response = await this.deps.client.send({
        method: "DELETE",
        path: `/api/organizations/${this.orgUuid}/chat_conversations/${convUuid}`,
        cookie: this.cookie,
        json: convUuid,
      });
      this.refreshCookie(response);
      await checkUpstreamResponse(response, this.deps.config.upstreamErrorPatterns);
      this.deps.logger.debug({ rid: this.deps.rid, event: "conversation_deleted", convUuid }, "conversation_deleted");
    } catch (error) {
      const relayError = toRelayError(error, "Failed to delete conversation");
      this.deps.logger.warn(
        {
          rid: this.deps.rid,
          event: "conversation_delete_failed",
          convUuid,
          errorCode: relayError.code,
          message: relayError.message,
        },
        "conversation_delete_failed",
      );
    }
  }

  /**
   * Discharges the cleanup obligation: deletes the conversation and hands
   * the cookie back with the health reason derived from `error`. Only the
   * first call has any effect.
   */
  public async release(error: RelayError | null): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;

    try {
      await this.deleteConversation();
    } finally {
      const reason = reasonForError(error);
      const lease: CookieLease = { id: this.lease.id, cookie: this.cookie };
      if (this.orgUuid) lease.orgUuid = this.orgUuid;
      if (this.isPro !== undefined) lease.isPro = this.isPro;

      const accepted = await this.deps.pool.returns.send({ lease, reason });
      if (accepted) {
        this.deps.logger.debug(
          { rid: this.deps.rid, event: "cookie_released", cookieId: lease.id, reason: describeReason(reason) },
          "cookie_released",
        );
      } else {
        this.deps.logger.warn(
          { rid: this.deps.rid, event: "cookie_return_rejected", cookieId: lease.id },
          "cookie_return_rejected",
        );
      }
    }
  }

  /** Send, pick up rotated cookies, then classify. */
  private async exchange(request: UpstreamRequest): Promise<Response> {
    const response = await this.deps.client.send(request);
    this.refreshCookie(response);
    return checkUpstreamResponse(response, this.deps.config.upstreamErrorPatterns);
  }

  private refreshCookie(response: Response): void {
    const rotated = mergeSetCookies(this.cookie, readSetCookies(response.headers));
    if (rotated !== this.cookie) {
      this.cookie = rotated;
      this.deps.logger.debug({ rid: this.deps.rid, event: "cookie_rotated", cookieId: this.lease.id }, "cookie_rotated");
    }
  }
}
