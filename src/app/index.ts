// App 入口：Hono 服务

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./router.js";
import { initUserDir, PUBLIC_DIR } from "../config/paths.js";
import { logger } from "../logger/index.js";
import { RefeedService } from "../service.js";


const PORT = Number(process.env.PORT) || 3751;


async function main(): Promise<void> {
  await initUserDir();
  const service = await RefeedService.create();
  const app = createApp(service, PUBLIC_DIR);
  const server = serve({ fetch: app.fetch, port: PORT }, (info) => {
    logger.info("app", "服务已启动", { url: `http://127.0.0.1:${info.port}/`, feeds: service.feedNames().length });
  });
  const shutdown = () => {
    server.close();
    service.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}


main().catch((err) => {
  logger.error("app", "启动失败", { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
