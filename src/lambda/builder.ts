import type { Context } from "aws-lambda";
import { emptyBuilderResponse } from "../builder/build.js";
import type { BuilderResponseData } from "../builder/types.js";
import { loadConfig, type LayerproofConfig } from "../config/config.js";
import { createLogger } from "../logging/logger.js";
import { httpCallbackTransport } from "../protocol/response.js";
import { failInvocation, wireBuilder } from "./wiring.js";

/** Lambda entry point for the layer builder custom resource. */
export async function handler(
  event: unknown,
  context: Context,
): Promise<BuilderResponseData> {
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
      emptyBuilderResponse(),
      error,
    );
  }

  const logger = createLogger({
    level: config.logLevel,
    context: { awsRequestId: context.awsRequestId },
  });
  const build = wireBuilder({ config, logger, transport });
  return await build(event, context);
}
