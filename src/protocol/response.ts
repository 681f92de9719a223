import { CallbackError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type {
  CallbackTransport,
  CustomResourceEvent,
  InvocationContext,
  ResponseBody,
  ResponseData,
  ResponseStatus,
} from "./types.js";

export function buildResponseBody(
  event: CustomResourceEvent,
  context: InvocationContext,
  status: ResponseStatus,
  data: ResponseData,
  reason?: string,
): ResponseBody {
  return {
    Status: status,
    Reason:
      reason ??
      `See the details in CloudWatch Log Stream: ${context.logStreamName}`,
    PhysicalResourceId: event.PhysicalResourceId ?? context.logStreamName,
    StackId: event.StackId,
    RequestId: event.RequestId,
    LogicalResourceId: event.LogicalResourceId,
    NoEcho: false,
    Data: data,
  };
}

/**
 * PUTs the response document to the pre-signed ResponseURL. The URL is
 * signed for an empty content-type, so the header is sent blank.
 */
export function httpCallbackTransport(
  fetchImpl: typeof fetch = fetch,
): CallbackTransport {
  return {
    async send(url: string, body: ResponseBody): Promise<void> {
      const response = await fetchImpl(url, {
        method: "PUT",
        headers: { "content-type": "" },
        body: JSON.stringify(body),
      });
      if (!response.ok) {
        throw new CallbackError(
          `Callback to ResponseURL failed with status ${response.status}`,
        );
      }
    },
  };
}

/**
 * Delivers the single terminal callback of one invocation. A second send
 * throws; failures of the transport itself propagate to the caller.
 */
export class Responder {
  private sentBody: ResponseBody | undefined;

  constructor(
    private readonly transport: CallbackTransport,
    private readonly event: CustomResourceEvent,
    private readonly context: InvocationContext,
    private readonly logger: Logger,
  ) {}

  get sent(): ResponseBody | undefined {
    return this.sentBody;
  }

  async send(
    status: ResponseStatus,
    data: ResponseData,
    reason?: string,
  ): Promise<ResponseBody> {
    if (this.sentBody) {
      throw new CallbackError(
        `Response already sent for request ${this.event.RequestId}`,
      );
    }
    const body = buildResponseBody(
      this.event,
      this.context,
      status,
      data,
      reason,
    );
    this.sentBody = body;
    this.logger.info("Sending custom resource response", {
      status,
      requestId: this.event.RequestId,
    });
    await this.transport.send(this.event.ResponseURL, body);
    return body;
  }
}
