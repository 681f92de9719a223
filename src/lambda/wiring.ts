import { loadCatalog } from "../catalog/catalog-loader.js";
import {
  createBuilderHandler,
  type BuilderHandler,
} from "../builder/handler.js";
import { createPipInstaller } from "../builder/installer.js";
import {
  createS3ObjectStore,
  sharedS3Client,
} from "../builder/object-store.js";
import { createRegistryClient } from "../builder/registry-client.js";
import type { ObjectStore } from "../builder/types.js";
import type { LayerproofConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../errors.js";
import { parseEvent } from "../protocol/event.js";
import { Responder } from "../protocol/response.js";
import type {
  CallbackTransport,
  InvocationContext,
  ResponseData,
} from "../protocol/types.js";
import {
  createVerifierHandler,
  type VerifierHandler,
} from "../verifier/handler.js";
import { createPythonProbe } from "../verifier/python-probe.js";

export interface WiringOptions {
  readonly config: LayerproofConfig;
  readonly logger: Logger;
  readonly transport: CallbackTransport;
  /** Defaults to Amazon S3. */
  readonly store?: ObjectStore;
}

export function wireBuilder(options: WiringOptions): BuilderHandler {
  const { config } = options;
  return createBuilderHandler({
    loadCatalog: () => loadCatalog(config.catalogPath),
    registry: createRegistryClient({ baseUrl: config.registryUrl }),
    installer: createPipInstaller({
      pythonExecutable: config.pythonExecutable,
    }),
    store: options.store ?? createS3ObjectStore(sharedS3Client()),
    transport: options.transport,
    workRoot: config.workRoot,
    logger: options.logger,
  });
}

export function wireVerifier(options: WiringOptions): VerifierHandler {
  const probe = createPythonProbe({
    pythonExecutable: options.config.pythonExecutable,
    layerRoot: options.config.layerRoot,
  });
  return createVerifierHandler({
    introspector: probe,
    loader: probe,
    transport: options.transport,
    logger: options.logger,
  });
}

/**
 * Report a failure that happened before a handler could be constructed,
 * so the orchestrator still receives its one callback.
 */
export async function failInvocation<T extends ResponseData>(
  rawEvent: unknown,
  context: InvocationContext,
  transport: CallbackTransport,
  logger: Logger,
  data: T,
  error: unknown,
): Promise<T> {
  const event = parseEvent(rawEvent);
  const reason = `Handler setup failed: ${errorMessage(error)}`;
  logger.error(reason, { requestId: event.RequestId });
  const responder = new Responder(transport, event, context, logger);
  const status = event.RequestType === "Delete" ? "SUCCESS" : "FAILED";
  await responder.send(status, data, reason);
  return data;
}
