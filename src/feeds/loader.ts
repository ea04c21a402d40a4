// feed 加载器：从 feeds/*.feed.{ts,js} 加载 feed 定义，文件名即默认 feed 名

import { readdir } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { join } from "node:path";
import { logger, errMessage } from "../logger/index.js";
import type { FeedDefinition } from "./types.js";


const FEED_EXTENSIONS = [".feed.ts", ".feed.js"];


/** 判断对象是否像 feed 定义（至少有 url）；完整校验在 createFeedDescriptor */
function isFeedDefinition(obj: unknown): obj is FeedDefinition {
  return obj != null && typeof obj === "object" && "url" in obj && typeof obj.url === "string";
}


function stemOf(fileName: string): string {
  const ext = FEED_EXTENSIONS.find((e) => fileName.endsWith(e)) ?? "";
  return fileName.slice(0, fileName.length - ext.length);
}


/** 加载目录下全部 feed 定义；目录不存在时返回空表 */
export async function loadFeedDefinitions(dir: string): Promise<Map<string, FeedDefinition>> {
  const feeds = new Map<string, FeedDefinition>();
  let names: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    names = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (err) {
    logger.warn("config", "feed 目录不可读", { dir, err: errMessage(err) });
    return feeds;
  }
  for (const fileName of names) {
    if (!FEED_EXTENSIONS.some((ext) => fileName.endsWith(ext))) continue;
    if (fileName.endsWith(".d.ts")) continue;
    const filePath = join(dir, fileName);
    try {
      const mod: unknown = await import(pathToFileURL(filePath).href);
      const def = mod != null && typeof mod === "object" && "default" in mod ? mod.default : mod;
      if (!isFeedDefinition(def)) {
        logger.warn("config", "feed 文件未默认导出 feed 定义，已跳过", { file: fileName });
        continue;
      }
      const name = def.name ?? stemOf(fileName);
      if (feeds.has(name)) {
        logger.warn("config", "feed 名称重复，后加载的覆盖先加载的", { feed: name, file: fileName });
      }
      feeds.set(name, { ...def, name });
    } catch (err) {
      logger.warn("config", "加载 feed 文件失败", { file: fileName, err: errMessage(err) });
    }
  }
  logger.info("config", "feed 定义已加载", { dir, count: feeds.size });
  return feeds;
}
