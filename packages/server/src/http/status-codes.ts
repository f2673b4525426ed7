export type { ContentfulStatusCode as StatusCode } from "hono/utils/http-status"
