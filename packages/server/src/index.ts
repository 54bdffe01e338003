// packages/server/src/index.ts

import Fastify from "fastify";
import cors from "@fastify/cors";
import { ServerConfig, loadServerConfig } from "./config";
import { registerRoutes } from "./routes";

function isLocalDevOrigin(origin: string): boolean {
  return /^http:\/\/(localhost|127\.0\.0\.1|0\.0\.0\.0|\[::1\])(:\d+)?$/.test(
    origin
  );
}

export async function buildServer(config: ServerConfig = loadServerConfig()) {
  const server = Fastify({ logger: { level: config.logLevel } });

  const allow = new Set(["http://localhost:5173", "http://127.0.0.1:5173"]);
  if (config.webOrigin) allow.add(config.webOrigin);

  await server.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (allow.has(origin)) return cb(null, true);
      if (isLocalDevOrigin(origin)) return cb(null, true);
      cb(new Error("Not allowed by CORS"), false);
    },
    credentials: true,
  });

  await registerRoutes(server, config);

  return server;
}

async function start() {
  const config = loadServerConfig();
  const server = await buildServer(config);
  try {
    const address = await server.listen({ port: config.port, host: config.host });
    server.log.info(`server listening on ${address}`);
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

if (require.main === module) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
