// Router：Hono 实现，仅负责 HTTP 层；GET /?<feed 名称> 输出 RSS，/public/* 提供播客文件

import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";
import { relative } from "node:path";
import { buildErrorRss } from "../feeder/index.js";
import { FeedConfigError, FeedNotFoundError } from "../feeds/errors.js";
import { logger, errMessage } from "../logger/index.js";
import type { RefeedService } from "../service.js";


const XML_CONTENT_TYPE = "application/xml; charset=UTF-8";


/** "?name" 或 "?name=" 都取 name；转义序列非法时返回 null */
export function feedNameFromQuery(rawUrl: string): string | null {
  const query = new URL(rawUrl).search.slice(1);
  const first = query.split("&")[0] ?? "";
  try {
    return decodeURIComponent(first.split("=")[0] ?? "").trim();
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}


export function createApp(service: RefeedService, publicDir: string): Hono {
  const app = new Hono();

  app.use(
    "/public/*",
    serveStatic({
      root: relative(process.cwd(), publicDir),
      rewriteRequestPath: (path) => path.replace(/^\/public/, ""),
    })
  );

  app.get("/", async (c) => {
    const name = feedNameFromQuery(c.req.url);
    if (name === null) return c.text("feed 名称编码无效", 400);
    if (!name) {
      return c.text(`用法: /?<feed 名称>\n可用: ${service.feedNames().join(", ")}\n`, 400);
    }
    try {
      const { feed, result } = await service.generate(name);
      if (!result.ok) {
        return c.body(buildErrorRss(feed, result.reason), 502, { "Content-Type": XML_CONTENT_TYPE });
      }
      return c.body(result.xml, 200, { "Content-Type": XML_CONTENT_TYPE });
    } catch (err) {
      if (err instanceof FeedNotFoundError) return c.text(err.message, 404);
      if (err instanceof FeedConfigError) {
        logger.error("config", "feed 定义无效", { feed: name, err: err.message });
        return c.text(err.message, 500);
      }
      logger.error("app", "请求处理异常", { feed: name, err: errMessage(err) });
      return c.text("Internal Server Error", 500);
    }
  });

  return app;
}
