/**
 * Simulation Layer
 *
 * In-process transport for tests: records every request and answers from a
 * queue of canned responses or from route handlers.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from "../transport/index.js";

/**
 * Canned response; omitted fields take 200/"OK"/no headers/empty body.
 */
export interface MockResponse {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: Buffer | string;
}

type Reply = MockResponse | Error;

interface Route {
  method?: string;
  url: string | RegExp;
  reply: (request: HttpRequest) => Reply;
}

/**
 * Mock HTTP transport.
 *
 * @example
 * ```typescript
 * const transport = new MockTransport().enqueue({ status: 200, body: "OK" });
 * const client = createClient(config, transport);
 * await client.getBuckets();
 * expect(transport.lastRequest()?.url).toBe("http://storage.googleapis.com");
 * ```
 */
export class MockTransport implements HttpTransport {
  private readonly queue: Reply[] = [];
  private readonly routes: Route[] = [];
  private readonly recorded: HttpRequest[] = [];

  /**
   * Queue a response (or an error to throw) for the next unrouted request.
   */
  enqueue(reply: Reply): this {
    this.queue.push(reply);
    return this;
  }

  /**
   * Answer every matching request with the given reply.
   */
  on(method: string | undefined, url: string | RegExp, reply: Reply | ((request: HttpRequest) => Reply)): this {
    let handler: (request: HttpRequest) => Reply;
    if (typeof reply === "function") {
      handler = reply;
    } else {
      const fixed = reply;
      handler = () => fixed;
    }
    this.routes.push({ method, url, reply: handler });
    return this;
  }

  get requests(): readonly HttpRequest[] {
    return this.recorded;
  }

  lastRequest(): HttpRequest | undefined {
    return this.recorded[this.recorded.length - 1];
  }

  reset(): void {
    this.queue.length = 0;
    this.routes.length = 0;
    this.recorded.length = 0;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recorded.push({ ...request, headers: { ...request.headers } });

    const route = this.routes.find((candidate) => MockTransport.matches(candidate, request));
    const reply = route ? route.reply(request) : this.queue.shift();
    if (reply === undefined) {
      throw new Error(`MockTransport: no response for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }

    return {
      status: reply.status ?? 200,
      statusText: reply.statusText ?? "OK",
      headers: reply.headers ?? {},
      body: typeof reply.body === "string" ? Buffer.from(reply.body) : reply.body ?? Buffer.alloc(0),
    };
  }

  private static matches(route: Route, request: HttpRequest): boolean {
    if (route.method && route.method !== request.method) {
      return false;
    }
    return typeof route.url === "string" ? route.url === request.url : route.url.test(request.url);
  }
}
