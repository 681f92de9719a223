export type RequestType = "Create" | "Update" | "Delete";

export type ResponseStatus = "SUCCESS" | "FAILED";

export type ResourceProperties = Readonly<Record<string, unknown>>;

export interface CustomResourceEvent {
  readonly RequestType: RequestType;
  readonly ResponseURL: string;
  readonly StackId: string;
  readonly RequestId: string;
  readonly LogicalResourceId: string;
  readonly PhysicalResourceId?: string;
  readonly ResourceType?: string;
  readonly ResourceProperties: ResourceProperties;
}

/** The slice of the Lambda context the protocol reads. */
export interface InvocationContext {
  readonly logStreamName: string;
}

export type ResponseData = Readonly<Record<string, string>>;

export interface ResponseBody {
  readonly Status: ResponseStatus;
  readonly Reason: string;
  readonly PhysicalResourceId: string;
  readonly StackId: string;
  readonly RequestId: string;
  readonly LogicalResourceId: string;
  readonly NoEcho: boolean;
  readonly Data: ResponseData;
}

export interface CallbackTransport {
  send(url: string, body: ResponseBody): Promise<void>;
}
