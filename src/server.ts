import http from "node:http";
import { MarketError, StateConflictError, TransferError, ValidationError } from "./errors.js";
import { logger } from "./logger.js";
import type { Market } from "./market.js";

type Body = Record<string, unknown>;

class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function send(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

function statusOf(err: MarketError): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof StateConflictError) return 409;
  if (err instanceof TransferError) return 502;
  return 500;
}

function sendError(res: http.ServerResponse, err: unknown) {
  if (err instanceof HttpError) {
    send(res, err.status, { error: { code: err.code, message: err.message } });
    return;
  }
  if (err instanceof MarketError) {
    send(res, statusOf(err), { error: { code: err.code, message: err.message } });
    return;
  }
  logger.error("Unhandled request error", err);
  send(res, 500, { error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
}

async function readBody(req: http.IncomingMessage): Promise<Body> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  const raw = Buffer.concat(chunks).toString("utf8");
  if (raw.length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new HttpError(400, "MALFORMED_JSON", "Request body is not valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new HttpError(400, "MALFORMED_JSON", "Request body must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

function requireString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError("INVALID_INPUT", `${field} is required`);
  }
  return value;
}

function requireNumber(body: Body, field: string): number {
  const value = body[field];
  if (typeof value !== "number") {
    throw new ValidationError("INVALID_INPUT", `${field} must be a number`);
  }
  return value;
}

function partyFromPath(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError("INVALID_INPUT", `Malformed party in path: ${segment}`);
  }
}

function requireSide(body: Body): "buy" | "sell" {
  const side = body.side;
  if (side !== "buy" && side !== "sell") {
    throw new ValidationError("INVALID_INPUT", `side must be "buy" or "sell"`);
  }
  return side;
}

/**
 * HTTP API over a market session.
 *
 * Routes:
 * - GET  /health
 * - POST /orders, GET /orders/count, GET /orders/:id
 * - POST /orders/:id/match, POST /orders/:id/execute
 * - POST /installations, GET /installations/count, GET /installations/:id
 * - POST /accounts/:party/credit, GET /accounts/:party
 */
export function createServer(market: Market) {
  async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    let m: RegExpMatchArray | null;

    if (method === "GET" && path === "/health") {
      send(res, 200, { ok: true });
      return;
    }

    if (method === "POST" && path === "/orders") {
      const body = await readBody(req);
      const id = market.orders.place(
        requireSide(body),
        requireNumber(body, "quantity"),
        requireNumber(body, "price"),
        requireString(body, "initiator"),
      );
      send(res, 201, { id });
      return;
    }

    if (method === "GET" && path === "/orders/count") {
      send(res, 200, { count: market.orders.count() });
      return;
    }

    if (method === "GET" && (m = path.match(/^\/orders\/(\d+)$/))) {
      send(res, 200, market.orders.view(Number(m[1])));
      return;
    }

    if (method === "POST" && (m = path.match(/^\/orders\/(\d+)\/match$/))) {
      const matchedOrderId = market.orders.match(Number(m[1]));
      send(res, 200, { matchedOrderId });
      return;
    }

    if (method === "POST" && (m = path.match(/^\/orders\/(\d+)\/execute$/))) {
      const orderId = Number(m[1]);
      const body = await readBody(req);
      market.orders.execute(orderId, requireNumber(body, "payment"), requireString(body, "caller"));
      send(res, 200, { executed: true });
      return;
    }

    if (method === "POST" && path === "/installations") {
      const body = await readBody(req);
      const id = market.installations.register(
        requireString(body, "owner"),
        requireNumber(body, "capacity"),
        requireNumber(body, "payment"),
      );
      send(res, 201, { id });
      return;
    }

    if (method === "GET" && path === "/installations/count") {
      send(res, 200, { count: market.installations.count() });
      return;
    }

    if (method === "GET" && (m = path.match(/^\/installations\/(\d+)$/))) {
      const { owner, capacity, installed } = market.installations.get(Number(m[1]));
      send(res, 200, { owner, capacity, installed });
      return;
    }

    if (method === "POST" && (m = path.match(/^\/accounts\/([^/]+)\/credit$/))) {
      const party = partyFromPath(m[1]);
      const body = await readBody(req);
      const balance = market.custody.credit(party, requireNumber(body, "amount"));
      send(res, 200, { balance });
      return;
    }

    if (method === "GET" && (m = path.match(/^\/accounts\/([^/]+)$/))) {
      const party = partyFromPath(m[1]);
      send(res, 200, { balance: market.custody.balanceOf(party) });
      return;
    }

    throw new HttpError(404, "NOT_FOUND", `No route for ${method} ${path}`);
  }

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => sendError(res, err));
  });
}
