/**
 * HTTP header names used on outbound and inbound requests
 */
export const HEADERS = {
  AUTHORIZATION: "Authorization",
  CACHE_CONTROL: "Cache-Control",
  CONTENT_TYPE: "Content-Type",
  /** Required by the cloud instance metadata server */
  METADATA_FLAVOR: "Metadata-Flavor",
} as const;
