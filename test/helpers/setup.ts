import { startStowage, type StartStowageOptions, type StowageServer } from "../../src/app.js";

export type { StowageServer };

export function startStowageTestServer(options: StartStowageOptions = {}): Promise<StowageServer> {
  return startStowage({ port: 0, host: "127.0.0.1", logger: false, ...options });
}
