import http from "http";

export interface ApiCall {
  method: string;
  payload: Record<string, unknown>;
}

export interface FakeTelegram {
  apiRoot: string;
  calls: ApiCall[];
  close(): Promise<void>;
}

const BOT_USER = {
  id: 1,
  is_bot: true,
  first_name: "Test Bot",
  username: "test_bot",
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
};

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => (body += chunk));
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

function toPayload(body: string): Record<string, unknown> {
  if (!body) return {};
  const parsed: unknown = JSON.parse(body);
  return typeof parsed === "object" && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
}

/**
 * In-process stand-in for the Bot API: answers getMe and records every other call.
 */
export async function startFakeTelegram(): Promise<FakeTelegram> {
  const calls: ApiCall[] = [];

  const server = http.createServer((req, res) => {
    readBody(req)
      .then((body) => {
        const method = (req.url ?? "").split("/").pop() ?? "";
        const result = method === "getMe" ? BOT_USER : true;
        if (method !== "getMe") calls.push({ method, payload: toPayload(body) });

        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ok: true, result }));
      })
      .catch(() => {
        res.writeHead(500).end();
      });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = address && typeof address === "object" ? address.port : 0;

  return {
    apiRoot: `http://127.0.0.1:${port}`,
    calls,
    close: () => new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve()))),
  };
}
