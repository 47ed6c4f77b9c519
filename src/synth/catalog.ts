// ---------------------------------------------------------------------------
// Catalog – provider and section tables shipped under assets/catalog/
// ---------------------------------------------------------------------------

import { readFileSync } from "node:fs";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { resolveAssetPath } from "../infra/assets.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const ModelEntrySchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  contextWindow: Type.Integer({ minimum: 1 }),
});

const BuiltinProviderSchema = Type.Object({
  env: Type.String(),
  label: Type.String(),
  key: Type.String(),
});

const CustomProviderSchema = Type.Object({
  key: Type.String(),
  env: Type.String(),
  api: Type.String(),
  baseUrl: Type.Optional(Type.String()),
  baseUrlEnv: Type.Optional(Type.String()),
  baseUrlDefault: Type.Optional(Type.String()),
  models: Type.Array(ModelEntrySchema),
});

const ProviderCatalogSchema = Type.Object({
  builtin: Type.Array(BuiltinProviderSchema),
  opencode: Type.Object({
    env: Type.Array(Type.String()),
    key: Type.String(),
  }),
  custom: Type.Array(CustomProviderSchema),
  bedrock: Type.Object({
    key: Type.String(),
    api: Type.String(),
    defaultRegion: Type.String(),
    providerFilterDefault: Type.String(),
    refreshInterval: Type.Integer({ minimum: 1 }),
    models: Type.Array(ModelEntrySchema),
  }),
  ollama: Type.Object({
    key: Type.String(),
    env: Type.String(),
    api: Type.String(),
    models: Type.Array(ModelEntrySchema),
  }),
  primaryModelPriority: Type.Array(
    Type.Object({
      // An env var name, or one of the derived sources "@opencode", "@bedrock", "@ollama".
      source: Type.String(),
      model: Type.String(),
    }),
  ),
});

export const FieldTypeSchema = Type.Union([
  Type.Literal("str"),
  Type.Literal("int"),
  Type.Literal("bool_true"),
  Type.Literal("bool_false"),
  Type.Literal("csv"),
  Type.Literal("csv_smart"),
]);

const FieldMappingSchema = Type.Object({
  env: Type.String(),
  path: Type.String(),
  type: FieldTypeSchema,
});

const ChannelGateSchema = Type.Union([
  Type.Object({ kind: Type.Literal("token"), env: Type.String(), field: Type.String() }),
  Type.Object({
    kind: Type.Literal("tokens"),
    env: Type.Array(Type.String(), { minItems: 1 }),
    fields: Type.Array(Type.String(), { minItems: 1 }),
  }),
  Type.Object({ kind: Type.Literal("flag"), env: Type.String() }),
]);

const ChannelSpecSchema = Type.Object({
  key: Type.String(),
  merge: Type.Boolean(),
  gate: ChannelGateSchema,
  fields: Type.Array(FieldMappingSchema),
});

const GatedSectionSchema = Type.Object({
  gate: Type.String(),
  fields: Type.Array(FieldMappingSchema),
});

const SectionCatalogSchema = Type.Object({
  channels: Type.Array(ChannelSpecSchema),
  browser: GatedSectionSchema,
  hooks: GatedSectionSchema,
});

export type ModelEntry = Static<typeof ModelEntrySchema>;
export type CustomProviderSpec = Static<typeof CustomProviderSchema>;
export type ProviderCatalog = Static<typeof ProviderCatalogSchema>;
export type FieldType = Static<typeof FieldTypeSchema>;
export type FieldMapping = Static<typeof FieldMappingSchema>;
export type ChannelGate = Static<typeof ChannelGateSchema>;
export type ChannelSpec = Static<typeof ChannelSpecSchema>;
export type SectionCatalog = Static<typeof SectionCatalogSchema>;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function loadCatalogFile<T extends TSchema>(fileName: string, schema: T): Static<T> {
  const filePath = resolveAssetPath("catalog", fileName);
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (!Value.Check(schema, parsed)) {
    const first = Value.Errors(schema, parsed).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "unknown error";
    throw new Error(`Invalid catalog ${filePath} (${where})`);
  }
  return parsed;
}

let providerCatalog: ProviderCatalog | undefined;
let sectionCatalog: SectionCatalog | undefined;

export function loadProviderCatalog(): ProviderCatalog {
  providerCatalog ??= loadCatalogFile("providers.json", ProviderCatalogSchema);
  return providerCatalog;
}

export function loadSectionCatalog(): SectionCatalog {
  sectionCatalog ??= loadCatalogFile("sections.json", SectionCatalogSchema);
  return sectionCatalog;
}
