import type { Context } from "aws-lambda";
import { loadConfig, type LayerproofConfig } from "../config/config.js";
import { createLogger } from "../logging/logger.js";
import { httpCallbackTransport } from "../protocol/response.js";
import type { VerifierResponseData } from "../verifier/types.js";
import { emptyVerifierResponse } from "../verifier/verdict.js";
import { failInvocation, wireVerifier } from "./wiring.js";

/** Lambda entry point for the layer verifier custom resource. */
export async function handler(
  event: unknown,
  context: Context,
): Promise<VerifierResponseData> {
  const transport = httpCallbackTransport();
  let config: LayerproofConfig;
  try {
    config = loadConfig();
  } catch (error) {
    return await failInvocation(
      event,
      context,
      transport,
      createLogger(),
      emptyVerifierResponse(),
      error,
    );
  }

  const logger = createLogger({
    level: config.logLevel,
    context: { awsRequestId: context.awsRequestId },
  });
  const verify = wireVerifier({ config, logger, transport });
  return await verify(event, context);
}
