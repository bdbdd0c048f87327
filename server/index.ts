import { createServer, type Server } from "http";
import type { FrameStore } from "./frame-store";
import { createApp } from "./app";
import { log } from "./log";

export type ServerConfig = {
  port: number;
  host: string;
};

export function resolveServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number.parseInt(env.PORT || "5050", 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }
  return {
    port,
    host: env.HOST || "127.0.0.1",
  };
}

export function startServer(
  store: FrameStore,
  config: ServerConfig = resolveServerConfig(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<Server> {
  const httpServer = createServer(createApp(store, env));
  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(
      {
        port: config.port,
        host: config.host,
      },
      () => {
        httpServer.off("error", reject);
        log(`serving on ${config.host}:${config.port}`);
        resolve(httpServer);
      },
    );
  });
}
