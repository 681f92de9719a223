import crypto from "node:crypto";
import type { CustomResourceEvent, RequestType } from "../protocol/types.js";

export const LOCAL_RESPONSE_URL = "local://layerproof/response";
export const LOCAL_LOG_STREAM = "layerproof-cli";

/** Event equivalent to what CloudFormation sends for a custom resource. */
export function synthesizeEvent(
  logicalResourceId: string,
  properties: Readonly<Record<string, string | undefined>>,
  requestType: RequestType = "Create",
): CustomResourceEvent {
  const resourceProperties: Record<string, string> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value !== undefined) {
      resourceProperties[key] = value;
    }
  }
  return {
    RequestType: requestType,
    ResponseURL: LOCAL_RESPONSE_URL,
    StackId: "arn:aws:cloudformation:local:000000000000:stack/layerproof/local",
    RequestId: crypto.randomUUID(),
    LogicalResourceId: logicalResourceId,
    ResourceType: `Custom::${logicalResourceId}`,
    ResourceProperties: resourceProperties,
  };
}
