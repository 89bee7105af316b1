/**
 * Shared constants for the content MCP gateway
 */

// TTL values (in seconds)
export const AUTHORIZATION_CODE_TTL_SECONDS = 10 * 60; // 10 minutes
export const ACCESS_TOKEN_TTL_SECONDS = 60 * 60; // 1 hour
export const SESSION_COOKIE_TTL_SECONDS = 24 * 60 * 60; // 1 day

// MCP transport session
export const SESSION_COOKIE_NAME = "mcp_session_id";
export const SESSION_ID_HEADER = "Mcp-Session-Id";
export const MCP_ROUTE = "/mcp";

// OAuth
export const DEFAULT_SCOPE = "mcp";
export const SUPPORTED_SCOPES = ["mcp"];
export const PKCE_METHODS = ["S256", "plain"] as const;
export const TOKEN_ENDPOINT_AUTH_METHODS = ["none", "client_secret_post", "client_secret_basic"] as const;
export const LOOPBACK_HOSTS = ["localhost", "127.0.0.1", "[::1]"];

// Input validation limits
export const MAX_CLIENT_NAME_LENGTH = 200;
export const MAX_REDIRECT_URI_LENGTH = 2000;
export const MAX_REDIRECT_URIS = 10;
export const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

// Text truncation limits
export const MAX_ERROR_TEXT_LENGTH = 200;
export const MAX_RAW_RESPONSE_LENGTH = 500;

// Server identity reported by initialize
export const SERVER_NAME = "content-mcp-gateway";
export const APP_VERSION = "0.1.0";
