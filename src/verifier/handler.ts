import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { parseEvent } from "../protocol/event.js";
import { Responder } from "../protocol/response.js";
import type {
  CallbackTransport,
  InvocationContext,
  ResourceProperties,
} from "../protocol/types.js";
import type {
  LoadResult,
  ModuleLoader,
  RuntimeIntrospector,
  Verdict,
  VerifierResponseData,
} from "./types.js";
import {
  NOT_AVAILABLE,
  computeVerdict,
  emptyVerifierResponse,
  failedVerdict,
  normalizeArchitecture,
  readExpectations,
  toVerifierResponse,
} from "./verdict.js";

export interface VerifierHandlerDependencies {
  readonly introspector: RuntimeIntrospector;
  readonly loader: ModuleLoader;
  readonly transport: CallbackTransport;
  readonly logger: Logger;
}

export type VerifierHandler = (
  event: unknown,
  context: InvocationContext,
) => Promise<VerifierResponseData>;

export function createVerifierHandler(
  deps: VerifierHandlerDependencies,
): VerifierHandler {
  return async (rawEvent, context) => {
    const event = parseEvent(rawEvent);
    const logger = deps.logger.child({
      handler: "verifier",
      requestId: event.RequestId,
    });
    logger.info("Event received", {
      requestType: event.RequestType,
      logicalResourceId: event.LogicalResourceId,
      properties: event.ResourceProperties,
    });
    const responder = new Responder(deps.transport, event, context, logger);

    if (event.RequestType === "Delete") {
      const data = emptyVerifierResponse();
      await responder.send("SUCCESS", data);
      return data;
    }

    const verdict = await evaluate(event.ResourceProperties, deps, logger);
    const data = toVerifierResponse(verdict);
    await responder.send(
      verdict.status,
      data,
      verdict.status === "FAILED" ? verdict.message : undefined,
    );
    logger.info("Response data", { data });
    return data;
  };
}

/** Any fault while observing the context becomes a FAILED verdict. */
export async function evaluate(
  properties: ResourceProperties,
  deps: Pick<VerifierHandlerDependencies, "introspector" | "loader">,
  logger: Logger,
): Promise<Verdict> {
  try {
    const expected = readExpectations(properties);
    const runtime = await deps.introspector.runtime();
    const architecture = normalizeArchitecture(
      deps.introspector.architecture(),
    );
    const imported: LoadResult =
      expected.importName === NOT_AVAILABLE
        ? { loaded: false }
        : await deps.loader.load(expected.importName, runtime);

    const verdict = computeVerdict(expected, {
      runtime,
      architecture,
      module: imported,
    });
    logger.info("Verification finished", {
      status: verdict.status,
      message: verdict.message,
    });
    return verdict;
  } catch (error) {
    const message = errorMessage(error);
    logger.error("Error during validation", { error: message });
    return failedVerdict(message);
  }
}
