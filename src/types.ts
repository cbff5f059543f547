export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface JsonObject {
  [key: string]: JsonValue;
}

/** One line of the repositories backing file. Only `id` means anything to the store. */
export type RepositoryRecord = JsonObject;

export type RepositoryResults = JsonObject;

export type Lookup<T> = { found: true; value: T } | { found: false };

export type ResultsLookup =
  | { found: true; value: RepositoryResults }
  | { found: false; reason: "missing" | "unreadable" };

export type SaveOutcome = { ok: true; path: string } | { ok: false; error: string };

export interface IconSpec {
  name: string;
  size: number;
  maskable: boolean;
}

export interface GeneratedIcon {
  name: string;
  path: string;
  size: number;
}

export interface IconRunResult {
  exitCode: number;
  sourcePath: string;
  generated: GeneratedIcon[];
}
