import fetch, { AbortError, FetchError, type Response } from "node-fetch";

import { endpointUrl, type Endpoint } from "./config.js";
import { mapFailure, type Envelope, type ErrorEnvelope, type Failure } from "./envelope.js";
import { truncate, type Logger } from "./log.js";
import { SESSION_HEADER, SessionTracker } from "./session.js";

export const REQUEST_TIMEOUT_MS = 30_000;

export type Outcome =
  | { kind: "forward"; messages: string[] }
  | { kind: "accepted" }
  | { kind: "error"; envelope: ErrorEnvelope };

export interface ForwarderOptions {
  endpoint: Endpoint;
  logger: Logger;
  timeoutMs?: number;
  session?: SessionTracker;
}

/**
 * Sends one envelope per call to the remote and classifies what comes back.
 * Calls must not overlap: the session token is read before the request and
 * written after the response.
 */
export class RequestForwarder {
  readonly session: SessionTracker;
  readonly url: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(opts: ForwarderOptions) {
    this.url = endpointUrl(opts.endpoint);
    this.logger = opts.logger;
    this.timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.session = opts.session ?? new SessionTracker();
  }

  async forward(envelope: Envelope): Promise<Outcome> {
    this.logger.debug(`→ remote: ${truncate(envelope.raw)}`);

    let res: Response;
    let body: string;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Accept": "application/json, text/event-stream",
          ...this.session.headers(),
        },
        body: envelope.raw,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await res.text();
    } catch (e) {
      const reason = connectionFailureReason(e, this.timeoutMs);
      if (reason === null) throw e;
      this.logger.error(`Connection error: ${reason}`);
      return this.fail({ kind: "connection", reason }, envelope);
    }

    if (res.status === 404) {
      this.logger.error(`HTTP 404: ${body}`);
      if (this.session.expire()) {
        this.logger.warn("Session expired, will re-initialize on next request");
      }
      return this.fail({ kind: "http", status: 404, body }, envelope);
    }

    const sid = res.headers.get(SESSION_HEADER);
    if (sid && this.session.observe(sid)) {
      this.logger.debug(`Session: ${sid}`);
    }

    if (!res.ok) {
      this.logger.error(`HTTP ${res.status}: ${body}`);
      return this.fail({ kind: "http", status: res.status, body }, envelope);
    }

    if (res.status === 202) {
      this.logger.debug("← remote: 202 Accepted");
      return { kind: "accepted" };
    }

    const contentType = res.headers.get("content-type") ?? "";
    const messages = contentType.includes("text/event-stream")
      ? parseEventStream(body)
      : [body.replace(/[\r\n]+$/, "")].filter((m) => m.length > 0);

    if (messages.length === 0) {
      this.logger.debug(`← remote: ${res.status} with no body`);
      return { kind: "accepted" };
    }

    this.logger.debug(`← remote: ${truncate(messages.join(" | "))}`);
    return { kind: "forward", messages };
  }

  private fail(failure: Failure, envelope: Envelope): Outcome {
    return { kind: "error", envelope: mapFailure(failure, envelope.id) };
  }
}

/** Null for errors that are not transport failures; those propagate. */
function connectionFailureReason(e: unknown, timeoutMs: number): string | null {
  if (e instanceof AbortError) return `timed out after ${timeoutMs}ms`;
  if (e instanceof FetchError) return e.message;
  return null;
}

/**
 * Splits a text/event-stream body into the data payload of each event.
 * Multi-line data is joined with "\n"; events without data are skipped.
 */
export function parseEventStream(text: string): string[] {
  const messages: string[] = [];
  let data: string[] = [];

  const dispatch = () => {
    if (data.length) messages.push(data.join("\n"));
    data = [];
  };

  for (const line of text.split(/\r\n|\r|\n/)) {
    if (line === "") {
      dispatch();
      continue;
    }
    if (line === "data" || line.startsWith("data:")) {
      const value = line.slice(5);
      data.push(value.startsWith(" ") ? value.slice(1) : value);
    }
  }
  dispatch();

  return messages;
}
