import type { Command, CommandContext } from "./Command.js";

export async function dispatchCommand<TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
): Promise<TResult> {
  const run = async (): Promise<TResult> => {
    const started = Date.now();

    try {
      ctx.logger?.info?.(`[CMD] ${command.type}`, { command });
      const result = await command.execute(ctx);
      ctx.logger?.info?.(`[CMD OK] ${command.type}`, {
        ms: Date.now() - started,
      });
      return result;
    } catch (error) {
      ctx.logger?.error?.(`[CMD ERR] ${command.type}`, {
        key: command.executionKey,
        error,
      });
      throw error;
    }
  };

  return ctx.executor ? ctx.executor.run(command.executionKey, run) : run();
}
