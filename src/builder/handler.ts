import type { Catalog } from "../catalog/types.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { parseEvent } from "../protocol/event.js";
import { Responder } from "../protocol/response.js";
import type {
  CallbackTransport,
  InvocationContext,
  ResourceProperties,
  ResponseStatus,
} from "../protocol/types.js";
import {
  buildLayer,
  emptyBuilderResponse,
  toBuilderResponse,
  type BuildDependencies,
} from "./build.js";
import type { BuilderResponseData } from "./types.js";
import { validateBuildRequest } from "./validate.js";

export interface BuilderHandlerDependencies extends BuildDependencies {
  /** Read per request, so a broken catalog is reported as FAILED. */
  readonly loadCatalog: () => Promise<Catalog>;
  readonly transport: CallbackTransport;
}

export type BuilderHandler = (
  event: unknown,
  context: InvocationContext,
) => Promise<BuilderResponseData>;

interface Outcome {
  readonly status: ResponseStatus;
  readonly data: BuilderResponseData;
  readonly reason?: string;
}

export function createBuilderHandler(
  deps: BuilderHandlerDependencies,
): BuilderHandler {
  return async (rawEvent, context) => {
    const event = parseEvent(rawEvent);
    const logger = deps.logger.child({
      handler: "builder",
      requestId: event.RequestId,
    });
    logger.info("Event received", {
      requestType: event.RequestType,
      logicalResourceId: event.LogicalResourceId,
      properties: event.ResourceProperties,
    });
    const responder = new Responder(deps.transport, event, context, logger);

    // Removing the resource leaves the published object in place.
    if (event.RequestType === "Delete") {
      const data = emptyBuilderResponse();
      await responder.send("SUCCESS", data);
      return data;
    }

    const outcome = await runBuild(event.ResourceProperties, deps, logger);
    await responder.send(outcome.status, outcome.data, outcome.reason);
    logger.info("Response data", { data: outcome.data });
    return outcome.data;
  };
}

async function runBuild(
  properties: ResourceProperties,
  deps: BuilderHandlerDependencies,
  logger: Logger,
): Promise<Outcome> {
  try {
    const catalog = await deps.loadCatalog();
    const request = validateBuildRequest(properties, catalog);
    const identity = await buildLayer(request, { ...deps, logger });
    logger.info("Layer published", { location: identity.location.location });
    return { status: "SUCCESS", data: toBuilderResponse(identity) };
  } catch (error) {
    const reason = `Lambda Layer creation failed: ${errorMessage(error)}`;
    logger.error(reason, {
      kind: error instanceof Error ? error.name : "unknown",
    });
    return { status: "FAILED", data: emptyBuilderResponse(), reason };
  }
}
