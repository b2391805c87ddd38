// pattern: Imperative Shell

import { createServer, type Server } from "node:http";
import type { ScoringService } from "../scoring/types.ts";
import { handleRequest } from "./handler.ts";

/**
 * HTTP server around `handleRequest`. A client that disconnects early aborts
 * its request, so the in-flight query is neither completed into the caches
 * nor written back.
 */
export function createRepoServer(service: ScoringService): Server {
  return createServer((req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    handleRequest(req.method ?? "GET", url, service, controller.signal)
      .then((result) => {
        if (controller.signal.aborted) return;
        res.writeHead(result.status, { "Content-Type": "application/json" });
        res.end(JSON.stringify(result.body));
      })
      .catch((error: unknown) => {
        console.error("[server] failed to write response:", error);
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
  });
}
