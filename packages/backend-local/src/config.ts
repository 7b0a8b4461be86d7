export interface ServerConfig {
  readonly port: number;
  readonly debug: boolean;
}

const DEFAULT_PORT = 8787;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env["PORT"];
  const port = rawPort === undefined || rawPort === "" ? DEFAULT_PORT : Number(rawPort);

  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${rawPort ?? ""}"`);
  }

  const debug = env["DEBUG"] !== undefined && env["DEBUG"] !== "" && env["DEBUG"] !== "0";

  return { port, debug };
}
