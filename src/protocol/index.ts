export { parseEvent, readProperty } from "./event.js";
export { createRecordingTransport } from "./recording-transport.js";
export type { RecordingTransport } from "./recording-transport.js";
export {
  Responder,
  buildResponseBody,
  httpCallbackTransport,
} from "./response.js";
export type {
  CallbackTransport,
  CustomResourceEvent,
  InvocationContext,
  RequestType,
  ResourceProperties,
  ResponseBody,
  ResponseData,
  ResponseStatus,
} from "./types.js";
