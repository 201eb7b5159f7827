/**
 * HTTP response status codes the SDK inspects
 *
 * Based on [RFC 9110](https://httpwg.org/specs/rfc9110.html#overview.of.status.codes)
 */
export enum HTTP {
  /**
   * **400 Bad Request**
   *
   * The platform rejected the request arguments.
   */
  BadRequest = 400,

  /**
   * **401 Unauthorized**
   *
   * Missing or invalid bearer credential. Also used by the middleware when a
   * presented token fails verification.
   */
  Unauthorized = 401,

  /** **403 Forbidden** */
  Forbidden = 403,

  /** **404 Not Found** */
  NotFound = 404,

  /** **409 Conflict** */
  Conflict = 409,

  /** **429 Too Many Requests** */
  TooManyRequests = 429,

  /** **500 Internal Server Error** */
  InternalServerError = 500,

  /** **503 Service Unavailable** */
  ServiceUnavailable = 503,
}
