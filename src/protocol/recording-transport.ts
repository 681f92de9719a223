import type { CallbackTransport, ResponseBody } from "./types.js";

export interface RecordingTransport extends CallbackTransport {
  readonly sent: readonly { url: string; body: ResponseBody }[];
  last(): ResponseBody | undefined;
}

/** Keeps callbacks in memory instead of delivering them. */
export function createRecordingTransport(): RecordingTransport {
  const sent: { url: string; body: ResponseBody }[] = [];
  return {
    sent,
    async send(url: string, body: ResponseBody): Promise<void> {
      sent.push({ url, body });
    },
    last: () => sent[sent.length - 1]?.body,
  };
}
