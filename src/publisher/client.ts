// pattern: Imperative Shell
import type { Logger } from "pino";
import { AuthError, PublishError, errorMessage } from "../errors";
import {
  POST_COLLECTION,
  createRecordResponseSchema,
  sessionSchema,
  uploadBlobResponseSchema,
} from "./types";
import type {
  ClientState,
  CreateRecordRequest,
  PostRecord,
  PublishResult,
  Session,
  UploadedAsset,
} from "./types";

export type PublishClientOptions = {
  readonly serviceUrl: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
};

type RequestBody = string | Buffer;

type XrpcRequest = {
  readonly nsid: string;
  readonly body?: RequestBody;
  readonly contentType?: string;
};

async function readErrorDetail(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.length > 0 ? text.slice(0, 500) : response.statusText;
  } catch (err) {
    return `unreadable body: ${errorMessage(err)}`;
  }
}

/**
 * The service reports an expired access token either as a bare 401 or as a
 * 400 carrying `{"error":"ExpiredToken"}`.
 */
async function isExpiredSession(response: Response): Promise<boolean> {
  if (response.status === 401) return true;
  if (response.status !== 400) return false;
  try {
    const body: unknown = await response.clone().json();
    return (
      typeof body === "object" &&
      body !== null &&
      "error" in body &&
      body.error === "ExpiredToken"
    );
  } catch {
    return false;
  }
}

/**
 * Client for an AT Protocol PDS that owns one authenticated session.
 *
 * Authorized calls that come back with an expired-session response refresh
 * the session once and are replayed once with the new access token. A second
 * rejection is reported as a {@link PublishError}; a failed refresh moves the
 * client to `failed` and every later call throws {@link AuthError}.
 */
export class PublishClient {
  private session: Session | null = null;
  private failed = false;

  constructor(private readonly options: PublishClientOptions) {}

  get state(): ClientState {
    if (this.failed) return "failed";
    return this.session ? "active" : "unauthenticated";
  }

  async login(identifier: string, password: string): Promise<Session> {
    if (this.failed) {
      throw new AuthError("client session has failed, create a new client");
    }

    const response = await this.sendForSession(
      {
        nsid: "com.atproto.server.createSession",
        body: JSON.stringify({ identifier, password }),
        contentType: "application/json",
      },
      null,
    );

    this.session = response;
    this.options.logger.info(
      { handle: response.handle, did: response.did },
      "publisher session created",
    );
    return { ...response };
  }

  async refreshSession(): Promise<void> {
    const current = this.requireSession();

    let refreshed: Session;
    try {
      refreshed = await this.sendForSession(
        { nsid: "com.atproto.server.refreshSession" },
        current.refreshJwt,
      );
    } catch (err) {
      this.failed = true;
      this.session = null;
      throw err;
    }

    this.session = refreshed;
    this.options.logger.info({ did: refreshed.did }, "publisher session refreshed");
  }

  async uploadAsset(bytes: Buffer, contentType: string): Promise<UploadedAsset> {
    const response = await this.sendAuthorized({
      nsid: "com.atproto.repo.uploadBlob",
      body: bytes,
      contentType,
    });

    const parsed = uploadBlobResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new PublishError(
        `malformed uploadBlob response: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        response.status,
      );
    }
    return parsed.data.blob;
  }

  async publish(record: PostRecord): Promise<PublishResult> {
    const request: CreateRecordRequest = {
      repo: this.requireSession().did,
      collection: POST_COLLECTION,
      record,
    };

    const response = await this.sendAuthorized({
      nsid: "com.atproto.repo.createRecord",
      body: JSON.stringify(request),
      contentType: "application/json",
    });

    const parsed = createRecordResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new PublishError(
        `malformed createRecord response: ${parsed.error.issues[0]?.message ?? "unknown"}`,
        response.status,
      );
    }
    return parsed.data;
  }

  private requireSession(): Session {
    if (this.failed) {
      throw new AuthError("client session has failed, create a new client");
    }
    if (!this.session) {
      throw new AuthError("not logged in");
    }
    return this.session;
  }

  private endpoint(nsid: string): string {
    return new URL(`/xrpc/${nsid}`, this.options.serviceUrl).toString();
  }

  private async post(request: XrpcRequest, token: string | null): Promise<Response> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (token) headers["Authorization"] = `Bearer ${token}`;
    if (request.contentType) headers["Content-Type"] = request.contentType;

    return fetch(this.endpoint(request.nsid), {
      method: "POST",
      signal: AbortSignal.timeout(this.options.timeoutMs),
      headers,
      body: request.body,
    });
  }

  private async sendForSession(
    request: XrpcRequest,
    token: string | null,
  ): Promise<Session> {
    let response: Response;
    try {
      response = await this.post(request, token);
    } catch (err) {
      throw new AuthError(`${request.nsid} request failed: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      throw new AuthError(
        `${request.nsid} failed: HTTP ${response.status} ${await readErrorDetail(response)}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new AuthError(`${request.nsid} returned invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = sessionSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError(`${request.nsid} returned a malformed session`);
    }
    return parsed.data;
  }

  private async sendOnce(request: XrpcRequest): Promise<Response> {
    const { accessJwt } = this.requireSession();
    try {
      return await this.post(request, accessJwt);
    } catch (err) {
      throw new PublishError(`${request.nsid} request failed: ${errorMessage(err)}`);
    }
  }

  private async sendAuthorized(request: XrpcRequest): Promise<Response> {
    let response = await this.sendOnce(request);

    if (await isExpiredSession(response)) {
      this.options.logger.info(
        { nsid: request.nsid, status: response.status },
        "access token rejected, refreshing session",
      );
      await response.body?.cancel();
      await this.refreshSession();
      response = await this.sendOnce(request);

      if (await isExpiredSession(response)) {
        throw new PublishError(
          `${request.nsid} rejected again after session refresh`,
          response.status,
        );
      }
    }

    if (!response.ok) {
      throw new PublishError(
        `${request.nsid} failed: HTTP ${response.status} ${await readErrorDetail(response)}`,
        response.status,
      );
    }

    return response;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new PublishError(
        `response was not valid JSON: ${errorMessage(err)}`,
        response.status,
      );
    }
  }
}
