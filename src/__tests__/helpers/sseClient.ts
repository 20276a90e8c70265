import http from "http";
import { URL } from "url";

export type SSEEvent = { event: string; data: unknown; id?: string };

type OnEventCb = (ev: SSEEvent) => void;
type OnOpenCb = () => void;
type OnEndCb = () => void;

export interface SSEConnection {
  close(): void;
  onEvent(cb: OnEventCb): void;
  onOpen(cb: OnOpenCb): void;
  onEnd(cb: OnEndCb): void;
}

export function openSSE(urlStr: string, options?: { headers?: Record<string, string> }): SSEConnection {
  const url = new URL(urlStr);

  const headers: Record<string, string> = {
    Accept: "text/event-stream",
    ...options?.headers
  };

  const req = http.request({
    method: "GET",
    hostname: url.hostname,
    port: url.port || 80,
    path: `${url.pathname}${url.search}`,
    headers
  });

  let onOpenCb: OnOpenCb | null = null;
  let onEndCb: OnEndCb | null = null;
  const onEventCbs: OnEventCb[] = [];

  let resRef: http.IncomingMessage | null = null;
  let buffer = "";
  let closed = false;

  req.on("response", (res: http.IncomingMessage) => {
    resRef = res;
    if (res.statusCode === 200) {
      if (onOpenCb) onOpenCb();
    }
    res.setEncoding("utf8");
    res.on("data", (chunk: string) => {
      buffer += chunk;
      // Process full SSE records separated by blank line
      let idx: number;
      while ((idx = buffer.indexOf("\n\n")) !== -1) {
        const raw = buffer.slice(0, idx);
        buffer = buffer.slice(idx + 2);
        processBlock(raw);
      }
    });
    res.on("end", () => {
      if (buffer.trim()) {
        processBlock(buffer);
        buffer = "";
      }
      if (onEndCb) onEndCb();
    });
  });

  // Connection errors surface as test timeouts.
  req.on("error", () => undefined);

  req.end();

  function processBlock(block: string) {
    const lines = block.split(/\n/).map((l) => l.replace(/\r$/, ""));
    let id: string | undefined;
    let event = "message";
    const dataLines: string[] = [];

    for (const line of lines) {
      if (line.length === 0) continue;
      // comment/heartbeat
      if (line.startsWith(":")) continue;
      const [field, ...rest] = line.split(":");
      const value = rest.join(":").trimStart();
      if (field === "id") {
        id = value;
      } else if (field === "event") {
        event = value || "message";
      } else if (field === "data") {
        dataLines.push(value);
      }
    }

    if (dataLines.length === 0) return;

    const dataStr = dataLines.join("\n");
    let parsed: unknown;
    try {
      parsed = JSON.parse(dataStr);
    } catch {
      parsed = dataStr;
    }

    const ev: SSEEvent = { event, data: parsed };
    if (id) ev.id = id;

    for (const cb of onEventCbs) cb(ev);
  }

  return {
    close: () => {
      if (closed) return;
      closed = true;
      resRef?.destroy();
      req.destroy();
    },
    onEvent: (cb: OnEventCb) => {
      onEventCbs.push(cb);
    },
    onOpen: (cb: OnOpenCb) => {
      onOpenCb = cb;
    },
    onEnd: (cb: OnEndCb) => {
      onEndCb = cb;
    }
  };
}
