// pattern: Imperative Shell

import { createServer } from "http";

import type { IncomingMessage, Server, ServerResponse } from "http";

export interface ReceivedRequest {
  method: string;
  path: string;
  headers: IncomingMessage["headers"];
  body: string;
}

export type RouteHandler = (
  request: ReceivedRequest,
  res: ServerResponse
) => void | Promise<void>;

/**
 * Loopback HTTP server for transport tests
 * Routes are keyed by `METHOD /path`; unknown routes answer 404
 */
export class TestHttpServer {
  private readonly server: Server;
  private port = 0;
  private readonly routes = new Map<string, RouteHandler>();
  readonly received: ReceivedRequest[] = [];

  constructor() {
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        res.writeHead(500, { "Content-Type": "text/plain" });
        res.end(error instanceof Error ? error.message : String(error));
      });
    });
  }

  /**
   * Start the server and return the actual port
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        const address = this.server.address();
        if (address && typeof address === "object") {
          this.port = address.port;
          resolve(this.port);
        } else {
          reject(new Error("Failed to get server address"));
        }
      });
    });
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    return new Promise((resolve, reject) => {
      this.server.close(err => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  getUrl(path = "/"): string {
    return `http://127.0.0.1:${this.port}${path}`;
  }

  route(method: string, path: string, handler: RouteHandler): void {
    this.routes.set(`${method.toUpperCase()} ${path}`, handler);
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://127.0.0.1");
    const received: ReceivedRequest = {
      method: req.method ?? "GET",
      path: url.pathname,
      headers: req.headers,
      body: await this.readRequestBody(req),
    };
    this.received.push(received);

    const handler = this.routes.get(`${received.method} ${received.path}`);
    if (!handler) {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("not found");
      return;
    }
    await handler(received, res);
  }

  private readRequestBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      let body = "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on("end", () => resolve(body));
      req.on("error", reject);
    });
  }
}
