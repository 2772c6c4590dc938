import { createLogger } from "@tilefont/log";
import { resolveAtlasConfig, type AtlasConfig } from "@tilefont/config";
import { AtlasError, combineAtlases } from "@tilefont/atlas-compose";

const log = createLogger("@tilefont/cli");

export const USAGE = "Usage: combine-atlases <output.png>";

export type CliDeps = {
  config?: AtlasConfig;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
};

/**
 * combine-atlases <output_path>
 * Returns the exit code for usage errors and success; decode/encode/config
 * failures reject.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.stdout ?? ((line: string) => { process.stdout.write(`${line}\n`); });

  if (argv.length !== 1) {
    print(USAGE);
    return 1;
  }
  const outputPath = argv[0];

  const config = deps.config ?? resolveAtlasConfig();
  log.debug({ config }, "cli.config");

  const res = await combineAtlases({
    tilesetPath: config.tilesetPath,
    fontPath: config.fontPath,
    outputPath,
    geometry: config.geometry,
    manifest: config.manifest,
  });

  print(`Created ${res.outputPath} (${res.width}x${res.height})`);
  print(`Added ${res.glyphsCopied} glyphs from font atlas in ${res.rowsAdded} new rows`);
  return 0;
}

/** `main` plus failure reporting: logs once at fatal, prints `Error: …`, resolves to 1. */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const printErr = deps.stderr ?? ((line: string) => { process.stderr.write(`${line}\n`); });
  try {
    return await main(argv, deps);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const where = err instanceof AtlasError ? { stage: err.stage, file: err.file } : {};
    log.fatal({ err, ...where }, "combine-atlases failed");
    printErr(`Error: ${message}`);
    return 1;
  }
}
