// ---------------------------------------------------------------------------
// Config document types
// ---------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

/** The persisted gateway configuration tree (`gateway.json`). */
export type ConfigDocument = JsonObject;

/**
 * One environment variable matching the binding convention, already
 * decomposed into its path segments.
 */
export type EnvBinding = {
  name: string;
  path: string[];
  raw: string;
};

/** Where the base document of a synthesis run came from. */
export type DocumentSource = "persisted" | "template" | "empty";

export type SynthesisResult = {
  document: ConfigDocument;
  source: DocumentSource;
  customOverlay: boolean;
  appliedBindings: EnvBinding[];
  hasProvider: boolean;
};
