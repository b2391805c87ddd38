// pattern: Functional Core

export type { HttpResult, ErrorResponse } from "./types.ts";
export { HttpError } from "./types.ts";
export { handleRequest, parseRepoQuery, REPOS_PATH } from "./handler.ts";
export { createRepoServer } from "./server.ts";
