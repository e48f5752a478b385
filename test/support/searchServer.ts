import * as http from "http";
import * as zlib from "zlib";
import { once } from "events";

export interface RecordedRequest {
  method: string;
  path: string;
  contentEncoding: string | undefined;
  body: string;
}

export interface SearchServer {
  url: string;
  port: number;
  requests: RecordedRequest[];
  /** "<METHOD> <path>" → status code answered instead of the normal reply */
  failures: Map<string, number>;
  close(): Promise<void>;
}

const readBody = async (req: http.IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const raw = Buffer.concat(chunks);
  return (req.headers["content-encoding"] === "gzip" ? zlib.gunzipSync(raw) : raw).toString("utf8");
};

/**
 * Minimal search cluster on a random local port: keeps a set of index names
 * and answers the index exists/create/delete and document calls.
 */
export async function startSearchServer(): Promise<SearchServer> {
  const indices = new Set<string>();
  const requests: RecordedRequest[] = [];
  const failures = new Map<string, number>();

  const server = http.createServer((req, res) => {
    const method = req.method ?? "GET";
    const path = (req.url ?? "/").split("?")[0];

    const reply = (status: number, body?: Record<string, unknown>) => {
      res.writeHead(status, {
        "content-type": "application/json",
        "x-elastic-product": "Elasticsearch",
      });
      res.end(body === undefined || method === "HEAD" ? undefined : JSON.stringify(body));
    };

    readBody(req)
      .then((body) => {
        requests.push({ method, path, contentEncoding: req.headers["content-encoding"], body });

        const failure = failures.get(`${method} ${path}`);
        if (failure !== undefined) {
          reply(failure, { error: { type: "internal_error", reason: "test failure" }, status: failure });
          return;
        }

        const [index, endpoint] = path.slice(1).split("/");
        if (endpoint === "_doc" && method === "POST") {
          reply(201, { _index: index, _id: "doc-1", result: "created" });
        } else if (endpoint !== undefined) {
          reply(404, { error: "unsupported" });
        } else if (method === "HEAD") {
          reply(indices.has(index) ? 200 : 404);
        } else if (method === "PUT") {
          indices.add(index);
          reply(200, { acknowledged: true, index });
        } else if (method === "DELETE") {
          indices.delete(index);
          reply(200, { acknowledged: true });
        } else {
          reply(404, { error: "unsupported" });
        }
      })
      .catch((error: unknown) => {
        reply(500, { error: String(error) });
      });
  });

  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    port: address.port,
    requests,
    failures,
    close: async () => {
      server.closeAllConnections();
      server.close();
      await once(server, "close");
    },
  };
}
