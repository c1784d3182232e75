import { z } from "zod";
import { ErrorCode, JSONRPC_VERSION } from "@modelcontextprotocol/sdk/types.js";

export type EnvelopeId = string | number | null;

/**
 * One parsed input line. `raw` is what goes on the wire; `id` is kept only
 * to correlate a mapped error with the caller's request.
 */
export interface Envelope {
  raw: string;
  id: EnvelopeId;
}

const IdSchema = z.union([z.string(), z.number()]);

// Only the envelope shape matters here; method/result schemas are the remote's business.
const MessageSchema = z.object({ id: z.unknown().optional() }).passthrough();
const BatchSchema = z.array(z.unknown());

export type ParseResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; reason: string };

export function parseEnvelope(line: string): ParseResult {
  const raw = line.trim();

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }

  if (BatchSchema.safeParse(doc).success) {
    return { ok: true, envelope: { raw, id: null } };
  }

  const msg = MessageSchema.safeParse(doc);
  if (!msg.success) {
    return { ok: false, reason: "expected a JSON-RPC object or batch" };
  }

  const id = IdSchema.safeParse(msg.data.id);
  return { ok: true, envelope: { raw, id: id.success ? id.data : null } };
}

export type Failure =
  | { kind: "http"; status: number; body: string }
  | { kind: "connection"; reason: string };

export interface ErrorEnvelope {
  jsonrpc: typeof JSONRPC_VERSION;
  id: EnvelopeId;
  error: { code: number; message: string };
}

export const TRANSPORT_ERROR_CODE: number = ErrorCode.ConnectionClosed;

export function describeFailure(failure: Failure) {
  return failure.kind === "http"
    ? `HTTP ${failure.status}: ${failure.body}`
    : `Connection error: ${failure.reason}`;
}

export function mapFailure(failure: Failure, id: EnvelopeId): ErrorEnvelope {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error: {
      code: TRANSPORT_ERROR_CODE,
      message: describeFailure(failure),
    },
  };
}
