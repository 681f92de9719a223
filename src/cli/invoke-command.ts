import fs from "node:fs/promises";
import {
  createLocalObjectStore,
  resolveStoreDir,
} from "../builder/local-store.js";
import type { LayerproofConfig } from "../config/config.js";
import { wireBuilder, wireVerifier } from "../lambda/wiring.js";
import type { Logger } from "../logging/logger.js";
import { createRecordingTransport } from "../protocol/recording-transport.js";
import { httpCallbackTransport } from "../protocol/response.js";
import type { CallbackTransport, ResponseBody } from "../protocol/types.js";
import type { HandlerName, ReportFormat } from "../report/types.js";
import { LOCAL_LOG_STREAM } from "./events.js";
import { renderResult, type CommandResult } from "./output.js";

export interface InvokeOptions {
  readonly handler: HandlerName;
  readonly eventPath: string;
  /** Record the callback instead of sending it to the event's ResponseURL. */
  readonly dryRun?: boolean;
  readonly storeDir?: string;
  readonly format: ReportFormat;
}

/** Replay a captured custom-resource event through one of the handlers. */
export async function runInvokeCommand(
  options: InvokeOptions,
  config: LayerproofConfig,
  logger: Logger,
  toolVersion: string,
): Promise<CommandResult> {
  const event = await readEvent(options.eventPath);
  const recorder = createRecordingTransport();
  const http = httpCallbackTransport();
  const transport: CallbackTransport = options.dryRun
    ? recorder
    : {
        async send(url: string, body: ResponseBody): Promise<void> {
          await http.send(url, body);
          await recorder.send(url, body);
        },
      };

  const context = { logStreamName: LOCAL_LOG_STREAM };
  if (options.handler === "builder") {
    const store =
      options.storeDir !== undefined
        ? createLocalObjectStore(resolveStoreDir(options.storeDir))
        : undefined;
    await wireBuilder({ config, logger, transport, store })(event, context);
  } else {
    await wireVerifier({ config, logger, transport })(event, context);
  }

  return renderResult(
    options.handler,
    recorder.last(),
    options.format,
    toolVersion,
  );
}

export function parseHandlerName(value: string): HandlerName {
  if (value === "builder" || value === "verifier") {
    return value;
  }
  throw new Error(`Unknown handler: ${value}. Expected builder or verifier`);
}

async function readEvent(eventPath: string): Promise<unknown> {
  const raw = await fs.readFile(eventPath, "utf8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Event file is not valid JSON: ${eventPath}`, {
      cause: error,
    });
  }
}
