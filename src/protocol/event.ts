import { InputError } from "../errors.js";
import type {
  CustomResourceEvent,
  RequestType,
  ResourceProperties,
} from "./types.js";

const REQUEST_TYPES = new Set<string>(["Create", "Update", "Delete"]);
const REQUIRED_FIELDS = [
  "ResponseURL",
  "StackId",
  "RequestId",
  "LogicalResourceId",
] as const;

/**
 * Narrow a raw invocation payload into a custom-resource event. Without a
 * valid ResponseURL no callback can be delivered, so this throws instead of
 * reporting FAILED.
 */
export function parseEvent(input: unknown): CustomResourceEvent {
  if (!isRecord(input)) {
    throw new InputError("Custom resource event must be an object");
  }

  const requestType = input.RequestType;
  if (typeof requestType !== "string" || !isRequestType(requestType)) {
    throw new InputError(
      `Unsupported RequestType: ${String(requestType)}. Expected Create, Update or Delete`,
    );
  }

  const missing = REQUIRED_FIELDS.filter((field) => {
    const value = input[field];
    return typeof value !== "string" || value.length === 0;
  });
  if (missing.length > 0) {
    throw new InputError(
      `Custom resource event is missing: ${missing.join(", ")}`,
    );
  }

  return {
    RequestType: requestType,
    ResponseURL: String(input.ResponseURL),
    StackId: String(input.StackId),
    RequestId: String(input.RequestId),
    LogicalResourceId: String(input.LogicalResourceId),
    PhysicalResourceId: optionalString(input.PhysicalResourceId),
    ResourceType: optionalString(input.ResourceType),
    ResourceProperties: parseProperties(input.ResourceProperties),
  };
}

function parseProperties(input: unknown): ResourceProperties {
  return isRecord(input) ? { ...input } : {};
}

/** Read a property as a trimmed string; empty and non-string values are absent. */
export function readProperty(
  properties: ResourceProperties,
  key: string,
): string | undefined {
  const value = properties[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRequestType(value: string): value is RequestType {
  return REQUEST_TYPES.has(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
