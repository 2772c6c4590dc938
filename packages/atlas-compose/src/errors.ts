export type AtlasStage = "input" | "output";

/** Decode/encode failure; `cause` keeps the sharp or fs error. */
export class AtlasError extends Error {
  constructor(
    readonly stage: AtlasStage,
    readonly file: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AtlasError";
  }
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
