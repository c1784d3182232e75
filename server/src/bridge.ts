import readline from "node:readline";
import type { Readable, Writable } from "node:stream";

import { parseEnvelope, type Envelope } from "./envelope.js";
import type { Outcome } from "./forwarder.js";
import type { Logger } from "./log.js";

/**
 * Yields one envelope per non-blank input line, in order, until the stream
 * ends. Lines that do not parse are logged and skipped: without an id there
 * is nothing to address a reply to.
 */
export async function* readEnvelopes(input: Readable, logger: Logger): AsyncGenerator<Envelope> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  try {
    for await (const line of rl) {
      if (!line.trim()) continue;

      const parsed = parseEnvelope(line);
      if (!parsed.ok) {
        logger.error(`Invalid JSON from stdin: ${parsed.reason}`);
        continue;
      }
      yield parsed.envelope;
    }
  } finally {
    rl.close();
  }
}

export class ResponseWriter {
  constructor(private readonly output: Writable) {}

  async write(outcome: Outcome): Promise<void> {
    switch (outcome.kind) {
      case "accepted":
        return;
      case "forward":
        for (const message of outcome.messages) await this.writeLine(message);
        return;
      case "error":
        await this.writeLine(JSON.stringify(outcome.envelope));
        return;
    }
  }

  private writeLine(line: string) {
    return new Promise<void>((resolve, reject) => {
      this.output.write(line + "\n", (err) => (err ? reject(err) : resolve()));
    });
  }
}

export interface Forwarder {
  forward(envelope: Envelope): Promise<Outcome>;
}

export interface BridgeOptions {
  input: Readable;
  output: Writable;
  forwarder: Forwarder;
  logger: Logger;
}

/**
 * Runs the read → forward → write loop until input ends. One exchange at a
 * time; the next line is not read until the previous reply has been written.
 */
export async function runBridge({ input, output, forwarder, logger }: BridgeOptions): Promise<void> {
  const writer = new ResponseWriter(output);

  for await (const envelope of readEnvelopes(input, logger)) {
    try {
      await writer.write(await forwarder.forward(envelope));
    } catch (e) {
      // Logged only: no reply is synthesized for failures outside the outcome types.
      logger.error("Unexpected error:", e instanceof Error ? e.message : e);
    }
  }

  logger.info("stdin closed, bridge exiting");
}
