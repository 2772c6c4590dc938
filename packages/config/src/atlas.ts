import * as fs from "node:fs";
import * as path from "node:path";
import AjvModule, { type ErrorObject, type JSONSchemaType } from "ajv";
import { DEFAULT_FONT_FILE, DEFAULT_GEOMETRY, DEFAULT_TILESET_FILE, type AtlasGeometry } from "./geometry.js";

const Ajv = AjvModule.default;

export type AtlasConfig = {
  tilesetPath: string;
  fontPath: string;
  geometry: AtlasGeometry;
  manifest: boolean;
};

/** Shape of the optional JSON file named by ATLAS_CONFIG. */
export type AtlasConfigFile = {
  tilesetPath?: string;
  fontPath?: string;
  geometry?: Partial<AtlasGeometry>;
  manifest?: boolean;
};

export class ConfigError extends Error {
  constructor(message: string, readonly file?: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const configFileSchema: JSONSchemaType<AtlasConfigFile> = {
  type: "object",
  additionalProperties: false,
  required: [],
  properties: {
    tilesetPath: { type: "string", minLength: 1, nullable: true },
    fontPath: { type: "string", minLength: 1, nullable: true },
    manifest: { type: "boolean", nullable: true },
    geometry: {
      type: "object",
      nullable: true,
      additionalProperties: false,
      required: [],
      properties: {
        tileSize: { type: "integer", minimum: 1, nullable: true },
        spacing: { type: "integer", minimum: 0, nullable: true },
        fontGrid: { type: "integer", minimum: 1, nullable: true },
        rowsToAdd: { type: "integer", minimum: 1, nullable: true },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
export const validateAtlasConfigFile = ajv.compile(configFileSchema);

function summarize(errors: ErrorObject[] | null | undefined): string {
  if (!errors?.length) return "invalid";
  return errors.map((e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`).join("; ");
}

function readConfigFile(file: string): AtlasConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`[config] cannot read ${file}: ${reason}`, file);
  }
  if (!validateAtlasConfigFile(parsed)) {
    throw new ConfigError(`[config] ${file}: ${summarize(validateAtlasConfigFile.errors)}`, file);
  }
  return parsed;
}

function envFlag(name: string, v: string | undefined): boolean | undefined {
  if (v === undefined || v === "") return undefined;
  const key = v.trim().toLowerCase();
  if (key === "1" || key === "true") return true;
  if (key === "0" || key === "false") return false;
  throw new ConfigError(`[config] ${name} must be one of 1, true, 0, false (got "${v}")`);
}

/**
 * Defaults, then the ATLAS_CONFIG file (paths relative to the file), then
 * TILESET_PATH / FONT_ATLAS_PATH / ATLAS_MANIFEST (paths relative to cwd).
 */
export function resolveAtlasConfig(opts?: { env?: NodeJS.ProcessEnv; cwd?: string }): AtlasConfig {
  const env = opts?.env ?? process.env;
  const cwd = opts?.cwd ?? process.cwd();

  const config: AtlasConfig = {
    tilesetPath: path.resolve(cwd, DEFAULT_TILESET_FILE),
    fontPath: path.resolve(cwd, DEFAULT_FONT_FILE),
    geometry: { ...DEFAULT_GEOMETRY },
    manifest: false,
  };

  if (env.ATLAS_CONFIG) {
    const file = path.resolve(cwd, env.ATLAS_CONFIG);
    const base = path.dirname(file);
    const fromFile = readConfigFile(file);
    if (fromFile.tilesetPath) config.tilesetPath = path.resolve(base, fromFile.tilesetPath);
    if (fromFile.fontPath) config.fontPath = path.resolve(base, fromFile.fontPath);
    if (typeof fromFile.manifest === "boolean") config.manifest = fromFile.manifest;
    config.geometry = { ...config.geometry, ...definedGeometry(fromFile.geometry ?? {}) };
  }

  if (env.TILESET_PATH) config.tilesetPath = path.resolve(cwd, env.TILESET_PATH);
  if (env.FONT_ATLAS_PATH) config.fontPath = path.resolve(cwd, env.FONT_ATLAS_PATH);
  config.manifest = envFlag("ATLAS_MANIFEST", env.ATLAS_MANIFEST) ?? config.manifest;

  return config;
}

// JSON nulls pass the schema (nullable) but must not clobber defaults
function definedGeometry(g: Partial<AtlasGeometry>): Partial<AtlasGeometry> {
  const out: Partial<AtlasGeometry> = {};
  if (typeof g.tileSize === "number") out.tileSize = g.tileSize;
  if (typeof g.spacing === "number") out.spacing = g.spacing;
  if (typeof g.fontGrid === "number") out.fontGrid = g.fontGrid;
  if (typeof g.rowsToAdd === "number") out.rowsToAdd = g.rowsToAdd;
  return out;
}
