import { Type, type Static } from "@sinclair/typebox";

const NonEmpty = Type.String({ minLength: 1 });

export const BindScopeSchema = Type.Union([Type.Literal("loopback"), Type.Literal("lan")]);

export const GatewayLaunchSchema = Type.Object({
  command: NonEmpty,
  /** Subcommand that starts the server; empty when the binary needs none. */
  subcommand: Type.String(),
  /** Working directory for the gateway and its self-check. */
  cwd: Type.Optional(NonEmpty),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  /** True when the port came from the environment (it then overrides the document). */
  portFromEnv: Type.Boolean(),
  bind: BindScopeSchema,
  verbose: Type.Boolean(),
  allowUnconfigured: Type.Boolean(),
  selfHeal: Type.Boolean(),
});

export const ProxySettingsSchema = Type.Object({
  enabled: Type.Boolean(),
  command: NonEmpty,
  configPath: NonEmpty,
  snippetDir: NonEmpty,
  healthPath: Type.String({ pattern: "^/" }),
  graceMs: Type.Integer({ minimum: 0 }),
});

export const AuthSettingsSchema = Type.Object({
  username: Type.String({ pattern: "^[^\\s\"{}#]+$" }),
  password: Type.Optional(Type.String()),
  bcryptCost: Type.Integer({ minimum: 4, maximum: 31 }),
});

export const BootConfigSchema = Type.Object({
  stateDir: NonEmpty,
  workspaceDir: NonEmpty,
  configPath: NonEmpty,
  customConfigPath: Type.Optional(NonEmpty),
  templatePath: Type.Optional(NonEmpty),
  tokenFilePath: NonEmpty,
  explicitToken: Type.Optional(NonEmpty),
  lockFiles: Type.Array(NonEmpty),
  gateway: GatewayLaunchSchema,
  proxy: ProxySettingsSchema,
  auth: AuthSettingsSchema,
});

export type BindScope = Static<typeof BindScopeSchema>;
export type GatewayLaunchSettings = Static<typeof GatewayLaunchSchema>;
export type ProxySettings = Static<typeof ProxySettingsSchema>;
export type AuthSettings = Static<typeof AuthSettingsSchema>;
export type BootSettings = Static<typeof BootConfigSchema>;
