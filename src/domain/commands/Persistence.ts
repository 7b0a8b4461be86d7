import type { CommandContext } from "./Command.js";

/**
 * Starts a persistence write without waiting for it. A failure is logged and
 * otherwise ignored; the in-memory state stays as it is.
 */
export function persistInBackground(
  { logger }: Pick<CommandContext, "logger">,
  operation: string,
  write: () => Promise<unknown>,
  meta: Record<string, unknown> = {},
): void {
  let pending: Promise<unknown>;
  try {
    pending = Promise.resolve(write());
  } catch (error) {
    pending = Promise.reject(error);
  }

  void pending.catch((error: unknown) => {
    logger?.warn?.("Persistence write failed", { operation, ...meta, error });
  });
}
