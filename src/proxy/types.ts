// ---------------------------------------------------------------------------
// Proxy snippet types
// ---------------------------------------------------------------------------

export type SnippetName = "auth" | "hooks";

/** A Caddyfile fragment imported by the main proxy config at startup. */
export type ProxySnippet = {
  name: SnippetName;
  fileName: string;
  content: string;
};

export type AuthConfig = {
  username: string;
  /** Unset or empty disables basic auth (the route itself stays up). */
  password?: string;
  /** Path left open for liveness checks. */
  healthPath?: string;
  /** bcrypt cost factor. */
  bcryptCost?: number;
};

export type HooksConfig = {
  enabled: boolean;
  /** URL path prefix forwarded to the gateway, e.g. "/hooks". */
  path: string;
  gatewayPort: number;
  gatewayHost?: string;
};
