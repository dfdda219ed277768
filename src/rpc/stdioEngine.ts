import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import type { StructuredLogger } from "../logger.js";
import type { RelayDispatcher } from "./dispatcher.js";
import type { JsonRpcResponse } from "./types.js";

export interface StdioEngineOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly dispatcher: RelayDispatcher;
  readonly logger: StructuredLogger;
}

function writeResponse(output: Writable, response: JsonRpcResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${JSON.stringify(response)}\n`, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Serves newline-delimited JSON-RPC until {@link StdioEngineOptions.input}
 * ends. Lines are handled strictly in order: a response is fully written
 * before the next line is read.
 *
 * An output failure (a client that closed its end of the pipe) stops the loop
 * and rejects with that error. The listener stays attached after the loop so a
 * late `EPIPE` cannot surface as an unhandled `'error'` event.
 */
export async function runStdioEngine({ input, output, dispatcher, logger }: StdioEngineOptions): Promise<void> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let outputError: unknown = null;
  output.on("error", (error: Error) => {
    if (outputError === null) {
      outputError = error;
      lines.close();
    }
  });

  let handled = 0;
  try {
    for await (const line of lines) {
      const response = await dispatcher.dispatchLine(line);
      if (response) {
        await writeResponse(output, response);
      }
      handled += 1;
    }
    if (outputError !== null) {
      throw outputError;
    }
  } finally {
    lines.close();
    logger.info("stdio_engine_stopped", { lines: handled });
  }
}
