export const DEFAULT_GATEWAY_BASE_URL = "http://localhost:8083";
export const DEFAULT_GATEWAY_API_VERSION = "v3";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const DEFAULT_MAX_ROWS = 5;
export const DEFAULT_MAX_SECONDS = 15;

export const POLL_INTERVAL_MS = 500;
export const CONFIGURE_TIMEOUT_MS = 10_000;
export const STREAM_START_TIMEOUT_MS = 60_000;
export const CANCEL_TIMEOUT_MS = 30_000;

export const RESULT_ROW_FORMAT = "JSON";
